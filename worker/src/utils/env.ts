export function getEnvBoolean(key: string, defaultValue = false): boolean {
  const raw = process.env[key];
  if (raw === undefined || raw === null || raw === "") {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;

  return defaultValue;
}

/** Non-negative number from the environment; malformed values fall back to the default. */
export function getEnvNumber(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") return defaultValue;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    console.warn(`[config] ignoring ${key}=${raw}; using ${defaultValue}`);
    return defaultValue;
  }
  return value;
}
