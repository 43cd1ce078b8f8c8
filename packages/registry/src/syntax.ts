import { MAX_LABEL_LENGTH, RESERVED_NAMESPACE } from "./constants.js";

const isAllowedChar = (code: number) =>
  (code >= 0x61 && code <= 0x7a) || (code >= 0x30 && code <= 0x39) || code === 0x2d;

/**
 * Shared label and namespace check: 1-20 chars of [a-z0-9-], no hyphen at
 * either end and no two hyphens in a row. Total for any input.
 */
export const isValidLabelOrNamespace = (value: unknown): boolean => {
  if (typeof value !== "string") return false;
  if (value.length < 1 || value.length > MAX_LABEL_LENGTH) return false;
  if (value.startsWith("-") || value.endsWith("-")) return false;
  for (let i = 0; i < value.length; i += 1) {
    const code = value.charCodeAt(i);
    if (!isAllowedChar(code)) return false;
    if (code === 0x2d && value.charCodeAt(i - 1) === 0x2d) return false;
  }
  return true;
};

export const isReservedNamespace = (value: string) => value === RESERVED_NAMESPACE;

export const isValidNamespace = (value: unknown): boolean =>
  isValidLabelOrNamespace(value) && value !== RESERVED_NAMESPACE;
