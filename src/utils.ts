export const isdigit = (ch: string): boolean =>
  ch.length === 1 && ch >= "0" && ch <= "9";

// `ch` is one code point, so it may be two UTF-16 units long
export const isalpha = (ch: string): boolean => /^\p{L}$/u.test(ch);

export const isalnum = (ch: string): boolean => isalpha(ch) || isdigit(ch);

export const isspace = (ch: string): boolean => /^\s$/u.test(ch);

/** Exhaustiveness guard for switches over closed unions. */
export const unreachable = (value: never, what: string): never => {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
};
