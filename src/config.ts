import path from 'path';
import { z } from 'zod';

const PROJECT_ROOT = path.resolve(__dirname, '..');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  DATA_DIR: z.string().default(path.join(PROJECT_ROOT, 'storage')),
  ANSWER_MAP_PATH: z.string().default(path.join(PROJECT_ROOT, 'src', 'data', 'answer-map.json')),
  CORS_ORIGINS: z.string().default('http://localhost:3000'),
  SMTP_HOST: optionalString,
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: optionalString,
  SMTP_PASS: optionalString,
  FROM_EMAIL: z.string().email().default('no-reply@example.com'),
  NAME_FIELD_REF: z.string().min(1).default('name_field_ref'),
  EMAIL_FIELD_REF: z.string().min(1).default('39f116ed-5403-407a-b506-c9625e9e6b2a'),
});

export type SmtpConfig = {
  host: string;
  port: number;
  user?: string;
  pass?: string;
};

export type AppConfig = {
  port: number;
  corsOrigins: string[];
  answerMapPath: string;
  storage: {
    payloadDir: string;
    chartDir: string;
    reportDir: string;
  };
  smtp: SmtpConfig | null;
  fromEmail: string;
  fieldRefs: {
    name: string;
    email: string;
  };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const cfg = parsed.data;
  const dataDir = path.resolve(cfg.DATA_DIR);

  return {
    port: cfg.PORT,
    corsOrigins: cfg.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    answerMapPath: path.resolve(cfg.ANSWER_MAP_PATH),
    storage: {
      payloadDir: path.join(dataDir, 'JsonData'),
      chartDir: path.join(dataDir, 'PdfData', 'charts'),
      reportDir: path.join(dataDir, 'PdfData', 'reports'),
    },
    smtp: cfg.SMTP_HOST ? { host: cfg.SMTP_HOST, port: cfg.SMTP_PORT, user: cfg.SMTP_USER, pass: cfg.SMTP_PASS } : null,
    fromEmail: cfg.FROM_EMAIL,
    fieldRefs: {
      name: cfg.NAME_FIELD_REF,
      email: cfg.EMAIL_FIELD_REF,
    },
  };
}
