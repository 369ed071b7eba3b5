export function formatTimestamp(): string {
  const now = new Date();
  return now.toLocaleTimeString('en-US', { hour12: false });
}

export function createProgressLog(verbose: boolean): (message: string) => void {
  if (!verbose) {
    return () => {};
  }
  return (message) => console.log(`[${formatTimestamp()}] ${message}`);
}
