// ── Diagnostics ─────────────────────────────────────────────────────

export interface LogOptions {
  /** Print per-declaration detail (skipped signatures, ignored files). */
  verbose?: boolean;
}

export function warn(area: string, message: string): void {
  console.warn(`[kiln] ${area}: ${message}`);
}

export function debug(options: LogOptions, area: string, message: string): void {
  if (!options.verbose) return;
  console.log(`[kiln] ${area}: ${message}`);
}
