/** Variable name to value, as produced by the parser. */
export type EnvMap = Record<string, string>;
