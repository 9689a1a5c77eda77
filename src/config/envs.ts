import 'dotenv/config';
import * as joi from 'joi';

interface EnvVars {
  NATS_SERVERS: string[];
  DATABASE_PATH: string;
  DEPARTMENTS_FILE: string;
  DOC_INTEL_ENDPOINT: string;
  DOC_INTEL_KEY: string;
  DOC_INTEL_MODEL: string;
  DOC_INTEL_API_VERSION: string;
  DOC_INTEL_POLL_INTERVAL_MS: number;
  DOC_INTEL_MAX_POLLS: number;
}

const envSchema = joi
  .object<EnvVars>({
    NATS_SERVERS: joi.array().items(joi.string()).min(1).required(),
    DATABASE_PATH: joi.string().default('data/invoices.db'),
    DEPARTMENTS_FILE: joi.string().default('config/departments.json'),
    DOC_INTEL_ENDPOINT: joi.string().uri().required(),
    DOC_INTEL_KEY: joi.string().required(),
    DOC_INTEL_MODEL: joi.string().default('prebuilt-invoice'),
    DOC_INTEL_API_VERSION: joi.string().default('2024-11-30'),
    DOC_INTEL_POLL_INTERVAL_MS: joi.number().integer().min(0).default(1200),
    DOC_INTEL_MAX_POLLS: joi.number().integer().min(1).default(60),
  })
  .unknown(true);

const { error, value } = envSchema.validate({
  ...process.env,
  NATS_SERVERS: process.env['NATS_SERVERS']?.split(',').map((item) => item.trim()),
});

if (error) {
  throw new Error(`Config validation error: ${error.message}`);
}

const envVars: EnvVars = value;

export const envs = {
  natsServers: envVars.NATS_SERVERS,
  databasePath: envVars.DATABASE_PATH,
  departmentsFile: envVars.DEPARTMENTS_FILE,
  docIntelEndpoint: envVars.DOC_INTEL_ENDPOINT.replace(/\/+$/, ''),
  docIntelKey: envVars.DOC_INTEL_KEY,
  docIntelModel: envVars.DOC_INTEL_MODEL,
  docIntelApiVersion: envVars.DOC_INTEL_API_VERSION,
  docIntelPollIntervalMs: envVars.DOC_INTEL_POLL_INTERVAL_MS,
  docIntelMaxPolls: envVars.DOC_INTEL_MAX_POLLS,
};
