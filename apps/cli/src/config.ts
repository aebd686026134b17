export type Env = Record<string, string | undefined>;

/** Helper to parse boolean env vars */
export const envBool = (key: string, defaultVal: boolean, env: Env = process.env): boolean => {
  const val = env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

export function parseRetries(value: string): number {
  const retries = Number(value);
  if (!Number.isInteger(retries) || retries < 0) {
    throw new Error(`--retries must be a non-negative integer, got "${value}"`);
  }
  return retries;
}

/**
 * The Gemini key is only needed when the model is called.
 */
export function requireApiKey(env: Env = process.env): string {
  const apiKey = env['GEMINI_API_KEY'];
  if (apiKey === undefined || apiKey === '') {
    throw new Error('GEMINI_API_KEY env var is required (set it in .env or the environment)');
  }
  return apiKey;
}
