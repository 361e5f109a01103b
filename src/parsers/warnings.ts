/**
 * Advisory conditions spotted in tool stderr. Never a failure.
 */

export const HIGH_ENTROPY_WARNING =
  "High entropy files detected - may indicate encryption or compression";

export function scanStderrWarnings(stderr: string): string[] {
  const warnings: string[] = [];
  if (/high entropy/i.test(stderr)) {
    warnings.push(HIGH_ENTROPY_WARNING);
  }
  return warnings;
}
