export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function jitter(maxMs: number, random: () => number = Math.random): number {
  if (maxMs <= 0) {
    return 0;
  }
  return Math.floor(random() * (maxMs + 1));
}
