const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSY_VALUES = new Set(['0', 'false', 'no', 'off']);

export function resolveIntegerEnv(input: {
  rawValue: string | undefined;
  fallbackValue: number;
  minimumValue: number;
  maximumValue: number;
}): number {
  const trimmed = String(input.rawValue ?? '').trim();
  const parsed = trimmed ? Number(trimmed) : Number.NaN;
  const normalized = Number.isFinite(parsed)
    ? Math.floor(parsed)
    : input.fallbackValue;
  if (normalized < input.minimumValue) return input.minimumValue;
  if (normalized > input.maximumValue) return input.maximumValue;
  return normalized;
}

export function resolveBooleanEnv(
  rawValue: string | undefined,
  fallbackValue: boolean,
): boolean {
  const normalized = String(rawValue ?? '')
    .trim()
    .toLowerCase();
  if (TRUTHY_VALUES.has(normalized)) return true;
  if (FALSY_VALUES.has(normalized)) return false;
  return fallbackValue;
}

export function resolveCsvEnv(
  rawValue: string | undefined,
  fallbackValue: string[],
): string[] {
  const entries = String(rawValue ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  if (!entries.length) return fallbackValue;
  return Array.from(new Set(entries));
}

export function resolveStringEnv(
  rawValue: string | undefined,
  fallbackValue: string,
): string {
  const normalized = String(rawValue ?? '').trim();
  return normalized || fallbackValue;
}
