export function getBoolean(value: string | number | undefined | boolean, defaultVal = false): boolean {
  if (value === undefined) return defaultVal;

  if (typeof value === 'string') value = value.trim().toLowerCase();

  switch (value) {
    case true:
    case 'true':
    case 1:
    case '1':
    case 'on':
    case 'yes':
      return true;

    case false:
    case 'false':
    case 0:
    case '0':
    case 'off':
    case 'no':
      return false;

    default:
      console.warn(`Unrecognized value at getBoolean: ${value}, returning default ${defaultVal}`);
      return defaultVal;
  }
}

export function getNumber(value: string | undefined, defaultVal: number, min = 0): number {
  if (value === undefined || value.trim() === '') return defaultVal;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < min) {
    console.warn(`Unrecognized numeric value: ${value}, returning default ${defaultVal}`);
    return defaultVal;
  }
  return parsed;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Comma-split a service label, dropping empty entries
export function splitServiceNames(label: string): string[] {
  return label
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export function targetComponentName(instance: string, serviceLabel: string): string {
  return `${instance} | ${serviceLabel}`;
}
