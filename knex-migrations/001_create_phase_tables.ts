import type { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  // Phase class instances; each instance runs the steps of its class
  await knex.schema.createTable('phase_instances', (table) => {
    table.increments('id');
    table.integer('class_id').notNullable();
    table.text('name').notNullable();

    table.index('class_id');
  });

  // Steps belong to a phase class, numbered by index_no
  await knex.schema.createTable('phase_steps', (table) => {
    table.increments('id');
    table.integer('class_id').notNullable();
    table.integer('index_no').notNullable();
    table.text('name').notNullable().defaultTo('');

    table.unique(['class_id', 'index_no']);
  });

  // Output activations of a phase instance per step
  await knex.schema.createTable('phase_activations', (table) => {
    table.increments('id');
    table.integer('phase_id').notNullable();
    table.integer('step_no').notNullable();
    table.integer('type'); // device class code
    table.integer('pid_type'); // PID type qualifier
    table.text('tag_name');

    table.foreign('phase_id').references('id').inTable('phase_instances').onDelete('CASCADE');
    table.index(['phase_id', 'step_no']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('phase_activations');
  await knex.schema.dropTableIfExists('phase_steps');
  await knex.schema.dropTableIfExists('phase_instances');
}
