export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.LOG_LEVEL?.toLowerCase() === "debug";
}

export function debugLog(tag: string, message: string, ...details: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.log(`[${tag}] debug: ${message}`, ...details);
}
