type EnvRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is EnvRecord =>
  Boolean(value) && typeof value === "object";

const getImportMetaEnv = (): EnvRecord => {
  try {
    const env: unknown = import.meta.env;
    return isRecord(env) ? env : {};
  } catch {
    return {};
  }
};

const getProcessEnv = (): EnvRecord => {
  if (typeof process === "undefined" || !isRecord(process.env)) return {};
  return process.env;
};

// Vite's import.meta.env wins over process.env for the same key.
export const getEnv = (): EnvRecord => {
  return { ...getProcessEnv(), ...getImportMetaEnv() };
};

export const getEnvString = (key: string): string | undefined => {
  const value = getEnv()[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

/** First non-empty value among `keys`; throws naming every key that was tried. */
export const requireEnvString = (...keys: string[]): string => {
  for (const key of keys) {
    const value = getEnvString(key);
    if (value) return value;
  }
  throw new Error(`Missing environment variable: ${keys.join(" or ")}`);
};
