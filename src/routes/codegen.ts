import express from 'express';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { CodegenConfigError, CodegenConfigStore, ConfigPatchSchema } from '../config/codegen-config';
import { CodeGenerationService, toConditionMap } from '../services/codeGenerationService';

export interface CodegenRouterDeps {
  service: CodeGenerationService;
  configStore: CodegenConfigStore;
  outputRoot: string;
}

// ---------- Schemas ----------
const ConditionLiteralSchema = z.object({
  label: z.string().regex(/^X\d+$/, 'Condition labels must be X<n>'),
  tag: z.string(),
  negated: z.boolean().default(false),
});

const ConditionSpecSchema = z
  .object({
    expression: z.string().default('X1'),
    conditions: z.array(ConditionLiteralSchema).optional(),
    literals: z.array(ConditionLiteralSchema).optional(),
  })
  .transform(({ expression, conditions, literals }) => ({
    expression,
    literals: conditions ?? literals ?? [],
  }));

const PreviewReqSchema = z.object({
  phase_instance_id: z.coerce.number().int().positive(),
});

const GenerateReqSchema = z.object({
  phase_instance_id: z.coerce.number().int().positive().optional(),
  controller_type: z.enum(['rockwell', 'siemens', 'all']).default('all'),
  activation_conditions: z
    .record(z.string().regex(/^\d+$/), z.record(z.string(), ConditionSpecSchema))
    .optional(),
  output_dir: z.string().optional(),
  routine_name: z.string().min(1).optional(),
  program_name: z.string().min(1).optional(),
});

export class OutputPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OutputPathError';
  }
}

/**
 * Resolves a client-supplied output directory inside the configured root
 */
export function resolveOutputDir(outputRoot: string, requested?: string): string {
  const root = path.resolve(outputRoot);
  const target = path.resolve(root, requested ?? '.');
  const relative = path.relative(root, target);
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new OutputPathError(`Output directory must stay inside ${outputRoot}`);
  }
  return target;
}

function resolveGeneratedFile(outputRoot: string, filename: string, requestedDir: unknown): string {
  if (path.basename(filename) !== filename) {
    throw new OutputPathError('Invalid file name');
  }
  const dir = resolveOutputDir(outputRoot, typeof requestedDir === 'string' ? requestedDir : undefined);
  return path.join(dir, filename);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function createCodegenRouter({ service, configStore, outputRoot }: CodegenRouterDeps): express.Router {
  const router = express.Router();

  // GET /config - Current mapping tables
  router.get('/config', (_req, res) => {
    res.json({ success: true, ...configStore.toDocument() });
  });

  // POST /config - Replace any of the three mapping tables and save them
  router.post('/config', async (req, res) => {
    const parsed = ConfigPatchSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: parsed.error.flatten() });
    }

    try {
      await configStore.update(parsed.data);
      res.json({ success: true, message: 'Configuration saved successfully' });
    } catch (error) {
      if (error instanceof CodegenConfigError) {
        return res.status(400).json({ success: false, error: error.message, issues: error.issues });
      }
      console.error('Error saving code generator configuration:', error);
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  // GET /phase-instances - Phase instances available for generation
  router.get('/phase-instances', async (_req, res) => {
    try {
      const phaseInstances = await service.listPhaseInstances();
      res.json({ success: true, phase_instances: phaseInstances });
    } catch (error) {
      console.error('Error listing phase instances:', error);
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  // POST /preview - Steps and suffixed tags that would be generated
  router.post('/preview', async (req, res) => {
    const parsed = PreviewReqSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: 'phase_instance_id is required for the preview' });
    }

    try {
      const preview = await service.preview(parsed.data.phase_instance_id);
      if (!preview) {
        return res.status(404).json({ success: false, error: 'No activations found for this phase instance' });
      }
      res.json({ success: true, ...preview });
    } catch (error) {
      console.error('Error building generation preview:', error);
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  // POST /generate - Generate Rockwell and/or Siemens files
  router.post('/generate', async (req, res) => {
    const parsed = GenerateReqSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: parsed.error.flatten() });
    }
    const body = parsed.data;

    try {
      const outputDir = resolveOutputDir(outputRoot, body.output_dir);
      const result = await service.generate({
        phaseInstanceId: body.phase_instance_id,
        controllerType: body.controller_type,
        conditions: toConditionMap(body.activation_conditions),
        outputDir,
        options: { routineName: body.routine_name, programName: body.program_name },
      });

      if (!result) {
        return res.status(404).json({ success: false, error: 'No activations found in the database' });
      }

      res.json({
        success: true,
        message: 'Code generated successfully',
        run_id: result.runId,
        activations_count: result.activationsCount,
        files: result.files,
        output_dir: result.outputDir,
        controller_type: body.controller_type,
        warnings: result.warnings,
      });
    } catch (error) {
      if (error instanceof OutputPathError) {
        return res.status(400).json({ success: false, error: error.message });
      }
      console.error('Error generating code:', error);
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  // GET /files/:filename - Download a generated file
  router.get('/files/:filename', (req, res) => {
    try {
      const filePath = resolveGeneratedFile(outputRoot, req.params.filename, req.query.output_dir);
      if (!fs.existsSync(filePath)) {
        return res.status(404).json({ success: false, error: 'File not found' });
      }
      res.download(filePath);
    } catch (error) {
      if (error instanceof OutputPathError) {
        return res.status(400).json({ success: false, error: error.message });
      }
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  // GET /files/:filename/content - Contents of a generated file
  router.get('/files/:filename/content', async (req, res) => {
    try {
      const filePath = resolveGeneratedFile(outputRoot, req.params.filename, req.query.output_dir);
      if (!fs.existsSync(filePath)) {
        return res.status(404).json({ success: false, error: 'File not found' });
      }
      const content = await fs.promises.readFile(filePath, 'utf-8');
      res.json({ success: true, filename: req.params.filename, content });
    } catch (error) {
      if (error instanceof OutputPathError) {
        return res.status(400).json({ success: false, error: error.message });
      }
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  return router;
}

export default createCodegenRouter;
