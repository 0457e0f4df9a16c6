type Sleep = (ms: number) => Promise<void>;

const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));

export { sleep };
export type { Sleep };
