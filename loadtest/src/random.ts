/** Uniform source in [0, 1), swappable for deterministic tests. */
export type RandomSource = () => number;

const CHARSET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export const randomString = (length: number, random: RandomSource = Math.random): string => {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += CHARSET[Math.floor(random() * CHARSET.length)];
  }
  return out;
};
