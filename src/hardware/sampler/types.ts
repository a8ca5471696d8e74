/**
 * Screen sampler adapter types
 */

/**
 * External command that prints one representative screen color
 */
export interface CommandSamplerConfig {
  /** Executable; null when no sampler is configured */
  command: string | null;
  args: readonly string[];
  timeoutMs: number;
}

/**
 * Subset of a promisified `child_process.execFile`
 */
export type ExecFileAPI = (
  file: string,
  args: readonly string[],
  options: { timeout: number; signal: AbortSignal; windowsHide: boolean }
) => Promise<{ stdout: string }>;
