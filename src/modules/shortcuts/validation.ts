/**
 * Input validation for shortcut names, values, categories, prefixes and page sizes.
 *
 * Every write path (commands, CSV import) goes through these so a rejected
 * value reads the same wherever it came from.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import {
  CATEGORY_PATTERN,
  DEFAULT_CATEGORY,
  SHORTCUT_LIMITS,
  ShortcutError,
  validationError,
} from "./types";

export function validateName(raw: string): Result<string, ShortcutError> {
  const name = raw.trim();
  if (name.length === 0) {
    return ErrResult(validationError("Shortcut name cannot be empty."));
  }
  if (name.length > SHORTCUT_LIMITS.maxNameLength) {
    return ErrResult(
      validationError(
        `Shortcut names can only be up to ${SHORTCUT_LIMITS.maxNameLength} characters long.`,
      ),
    );
  }
  return OkResult(name);
}

/** Values are stored verbatim; only an all-whitespace value is rejected. */
export function validateValue(raw: string): Result<string, ShortcutError> {
  if (raw.trim().length === 0) {
    return ErrResult(validationError("Shortcut value cannot be empty."));
  }
  return OkResult(raw);
}

/** Missing or blank categories fall back to `General`. */
export function validateCategory(
  raw: string | null | undefined,
): Result<string, ShortcutError> {
  const category = (raw ?? "").trim();
  if (category.length === 0) return OkResult(DEFAULT_CATEGORY);

  if (category.length > SHORTCUT_LIMITS.maxCategoryLength) {
    return ErrResult(
      validationError(
        `Category names can only be up to ${SHORTCUT_LIMITS.maxCategoryLength} characters long.`,
      ),
    );
  }
  if (!CATEGORY_PATTERN.test(category)) {
    return ErrResult(
      validationError(
        "Category names may only contain letters, digits, spaces, hyphens and underscores.",
      ),
    );
  }
  return OkResult(category);
}

export function validatePrefix(raw: string): Result<string, ShortcutError> {
  const prefix = raw.trim();
  if (prefix.length === 0) {
    return ErrResult(validationError("Prefix cannot be empty."));
  }
  return OkResult(prefix);
}

export function validatePageSize(value: number): Result<number, ShortcutError> {
  if (
    !Number.isInteger(value) ||
    value < SHORTCUT_LIMITS.minPageSize ||
    value > SHORTCUT_LIMITS.maxPageSize
  ) {
    return ErrResult(
      validationError(
        `Page size must be a whole number between ${SHORTCUT_LIMITS.minPageSize} and ${SHORTCUT_LIMITS.maxPageSize}.`,
      ),
    );
  }
  return OkResult(value);
}

/** Key used for case-insensitive uniqueness. */
export const nameKey = (name: string): string => name.trim().toLowerCase();
