export type Env = Record<string, string | undefined>;

export function readRequiredEnv(name: string, env: Env = process.env): string {
  const value = env[name];
  if (!value) {
    throw new Error(`${name} environment variable is required`);
  }

  return value;
}

export function readOptionalEnv(name: string, env: Env = process.env): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function readIntEnv(name: string, fallback: number, env: Env = process.env): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return Math.floor(parsed);
}

export function readBoolEnv(name: string, fallback: boolean, env: Env = process.env): boolean {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }

  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }

  return fallback;
}
