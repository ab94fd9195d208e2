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

export function getEnvInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") {
    return defaultValue;
  }
  const parsed = Number(raw.trim());
  if (!Number.isInteger(parsed)) {
    return defaultValue;
  }
  return parsed;
}

export function getEnvFloat(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") {
    return defaultValue;
  }
  const parsed = Number(raw.trim());
  if (!Number.isFinite(parsed)) {
    return defaultValue;
  }
  return parsed;
}

export function getEnvString(key: string, defaultValue: string): string {
  const raw = process.env[key]?.trim();
  return raw ? raw : defaultValue;
}
