export type Sleep = (ms: number) => Promise<void>;

export const delay: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/** Uniform pick in [min, max] ms, used for the pause between pages. */
export function randomDelayMs(min: number, max: number, random: () => number = Math.random): number {
  if (max <= min) return min;
  return Math.round(min + random() * (max - min));
}
