// Debug lines are only printed with LOG_LEVEL=debug; everything else goes
// straight through console with a [Component] prefix.
function isDebugEnabled(): boolean {
  return (process.env.LOG_LEVEL ?? '').toLowerCase() === 'debug';
}

export function debug(prefix: string, message: string): void {
  if (isDebugEnabled()) {
    console.log(`[${prefix}] ${message}`);
  }
}
