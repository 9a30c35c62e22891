import dotenv from 'dotenv';

dotenv.config();

export interface AppConfig {
  port: number;
  environment: string;
  codegen: {
    configFile: string;
    outputDir: string;
  };
  corsOrigins: string[];
}

export const getAppConfig = (): AppConfig => {
  return {
    port: parseInt(process.env.PORT || '5000', 10),
    environment: process.env.NODE_ENV || 'development',
    codegen: {
      configFile: process.env.CODEGEN_CONFIG_FILE || 'plc_config.json',
      outputDir: process.env.CODEGEN_OUTPUT_DIR || 'output',
    },
    corsOrigins: (process.env.CORS_ORIGINS || 'http://localhost:5173')
      .split(',')
      .map(origin => origin.trim())
      .filter(Boolean),
  };
};
