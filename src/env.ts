// Environment configuration for the triage API
// All settings come from environment variables (see .env.example)

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3737),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Triage
  TRIAGE_RULES_PATH: strEnv(process.env.TRIAGE_RULES_PATH, 'config/departments.json'),
  TRIAGE_MIN_SYMPTOM_CHARS: parsePositiveInt(process.env.TRIAGE_MIN_SYMPTOM_CHARS, 20, 'TRIAGE_MIN_SYMPTOM_CHARS'),
  TRIAGE_MAX_SYMPTOM_CHARS: parsePositiveInt(process.env.TRIAGE_MAX_SYMPTOM_CHARS, 2000, 'TRIAGE_MAX_SYMPTOM_CHARS'),

  // Auth
  AUTH_ENFORCEMENT_ENABLED: process.env.AUTH_ENFORCEMENT_ENABLED === 'true',
  JWT_SECRET: strEnv(process.env.JWT_SECRET),

  // Rate limiting
  RATE_LIMITING_ENABLED: process.env.RATE_LIMITING_ENABLED === 'true',
  RATE_LIMIT_WINDOW_MS: parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 60000, 'RATE_LIMIT_WINDOW_MS'),
  RATE_LIMIT_TRIAGE_PER_WINDOW: parsePositiveInt(
    process.env.RATE_LIMIT_TRIAGE_PER_WINDOW,
    30,
    'RATE_LIMIT_TRIAGE_PER_WINDOW',
  ),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export const isProduction = () => env.NODE_ENV === 'production';

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  console.log('Triage API Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  CORS origins: ${env.CORS_ORIGINS.join(', ') || 'none'}`);
  console.log(`  Rule table: ${env.TRIAGE_RULES_PATH}`);
  console.log(`  Symptom length: ${env.TRIAGE_MIN_SYMPTOM_CHARS}-${env.TRIAGE_MAX_SYMPTOM_CHARS} chars`);
  console.log(`  Auth enforcement enabled: ${env.AUTH_ENFORCEMENT_ENABLED}`);
  console.log(`  JWT verification: ${env.JWT_SECRET ? 'on' : 'off (token presence only)'}`);
  console.log(`  Rate limiting enabled: ${env.RATE_LIMITING_ENABLED}`);
  if (env.RATE_LIMITING_ENABLED) {
    console.log(`  Rate limit window ms: ${env.RATE_LIMIT_WINDOW_MS}`);
    console.log(`  /triage max per window: ${env.RATE_LIMIT_TRIAGE_PER_WINDOW}`);
  }
}
