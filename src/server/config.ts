// =============================================================================
// Application Configuration — Centralised + Validated
// =============================================================================
import dotenv from 'dotenv';
dotenv.config();

export interface AppConfig {
  port: number;
  nodeEnv: string;
  /** Public origin used to build recording download links in notes */
  publicBaseUrl: string;
  zoomAccountId: string;
  zoomClientId: string;
  zoomClientSecret: string;
  zoomWebhookSecretToken: string;
  skipWebhookSignature: boolean;
  ghlApiKey: string;
  ghlLocationId: string;
  dedupeCapacity: number;
}

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

const config: AppConfig = {
  port: positiveInt(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV ?? 'development',
  publicBaseUrl: (process.env.PUBLIC_BASE_URL ?? 'http://localhost:3000').replace(/\/+$/, ''),

  // Zoom (server-to-server OAuth app + webhook secret)
  zoomAccountId: process.env.ZOOM_ACCOUNT_ID ?? '',
  zoomClientId: process.env.ZOOM_CLIENT_ID ?? '',
  zoomClientSecret: process.env.ZOOM_CLIENT_SECRET ?? '',
  zoomWebhookSecretToken: process.env.ZOOM_WEBHOOK_SECRET_TOKEN ?? '',
  skipWebhookSignature: process.env.SKIP_WEBHOOK_SIGNATURE === 'true',

  // GoHighLevel
  ghlApiKey: process.env.GHL_API_KEY ?? '',
  ghlLocationId: process.env.GHL_LOCATION_ID ?? '',

  // Dedup windows (events and notes each get their own set)
  dedupeCapacity: positiveInt(process.env.DEDUPE_CAPACITY, 1000),
};

// Validate critical vars at startup
const REQUIRED: Array<keyof AppConfig> = [
  'zoomAccountId',
  'zoomClientId',
  'zoomClientSecret',
  'zoomWebhookSecretToken',
  'ghlApiKey',
];

for (const key of REQUIRED) {
  if (!config[key]) {
    const level = config.nodeEnv === 'production' ? 'error' : 'warn';
    console[level](`⚠️  Missing config: ${key}`);
  }
}

export default config;
