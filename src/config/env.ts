export interface StoreConfig {
  url: string;
  serviceRoleKey: string;
  // undefined when DATABASE_SCHEMA is not set; the store then uses `public`
  schema?: string;
}

export interface ExtractionCapabilities {
  pdf: boolean;
  docx: boolean;
}

export interface AppConfig {
  port: number;
  bodyLimit: string;
  maxUploadBytes: number;
  allowedOrigins: string[];
  store: StoreConfig | null;
  capabilities: ExtractionCapabilities;
}

const DISABLED_VALUES = ['false', '0', 'off', 'no'];

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return !DISABLED_VALUES.includes(value.trim().toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const url = env.SUPABASE_URL?.trim();
  const serviceRoleKey = env.SUPABASE_SERVICE_ROLE_KEY?.trim();
  const schema = env.DATABASE_SCHEMA?.trim() || undefined;

  return {
    port: Number(env.PORT || 8000),
    bodyLimit: env.BODY_LIMIT || '10mb',
    maxUploadBytes: Number(env.MAX_UPLOAD_BYTES || 10 * 1024 * 1024),
    allowedOrigins: (env.ALLOWED_ORIGINS || '').split(',').map((s) => s.trim()).filter(Boolean),
    store: url && serviceRoleKey ? { url, serviceRoleKey, schema } : null,
    capabilities: {
      pdf: flag(env.PDF_SUPPORT, true),
      docx: flag(env.DOCX_SUPPORT, true),
    },
  };
}
