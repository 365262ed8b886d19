export function requireEnv(name: string, defaultValue?: string): string {
  const value = process.env[name];
  if (value && value !== '') return value;
  if (defaultValue !== undefined) return defaultValue;
  throw new Error(`Missing required environment variable: ${name}`);
}

export function requireIntEnv(name: string, defaultValue?: number): number {
  const raw = requireEnv(name, defaultValue === undefined ? undefined : String(defaultValue));
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Environment variable ${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}
