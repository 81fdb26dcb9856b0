/**
 * Generates a UUID v4 string.
 */
export function uuid(): string {
  if (typeof crypto !== 'undefined' && typeof crypto.randomUUID === 'function') {
    return crypto.randomUUID();
  }

  return 'xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx'.replace(/[xy]/g, (c) => {
    const r = (Math.random() * 16) | 0;
    const v = c === 'x' ? r : (r & 0x3) | 0x8;
    return v.toString(16);
  });
}

let sequence = 0;

/**
 * Short identifier unique within the current process, e.g. `scene-12`.
 */
export function nextId(prefix: string): string {
  sequence += 1;
  return `${prefix}-${sequence}`;
}
