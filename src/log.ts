/**
 * Console logging. Structured events go to stderr only when PBISECT_STRUCTURED_LOG=1.
 */

const PREFIX = "pbisect:";

export function log(message: string): void {
  console.log(`${PREFIX} ${message}`);
}

export function warn(message: string): void {
  console.error(`${PREFIX} ${message}`);
}

export function logStructured(event: string, fields: Record<string, unknown> = {}): void {
  if (process.env.PBISECT_STRUCTURED_LOG !== "1") return;
  try {
    process.stderr.write(JSON.stringify({ event, ts: Date.now(), ...fields }) + "\n");
  } catch {
    // stderr closed
  }
}
