/** Settle delay. Zero resolves on the next microtask so fixtures stay fast. */
export function delay(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise(resolve => setTimeout(resolve, ms));
}
