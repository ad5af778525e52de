let quiet = false;

export function setQuiet(value: boolean): void {
  quiet = value;
}

/** Progress output. Goes to stderr so stdout stays parseable. */
export function log(message: string): void {
  if (quiet) return;
  console.error(message);
}

/** Soft-degraded conditions. Printed even in quiet mode. */
export function warn(message: string): void {
  console.error(`Warning: ${message}`);
}
