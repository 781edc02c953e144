import { isAbsolute, relative, resolve } from 'path';

/**
 * Centralized security validation and sanitization utilities.
 *
 * Creator repositories are third-party content: their logical paths and
 * `.gitmodules` entries must not be able to point outside the checkout or
 * smuggle options into git.
 */
export class SecurityValidator {
  /**
   * Patterns that are rejected in clone URLs handed to git
   */
  private static readonly DANGEROUS_URL_PATTERNS = [
    /^-/,              // Option injection (URLs starting with -)
    /[\x00-\x1f\x7f]/, // Control characters including null bytes
    /\s/,              // Whitespace characters
    /^ext::/i,         // git remote helper that runs arbitrary commands
    /^fd::/i
  ];

  /**
   * Checks whether `target` is `root` or a descendant of it.
   */
  static isWithin(root: string, target: string): boolean {
    const rel = relative(resolve(root), resolve(target));
    return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
  }

  /**
   * Validates a clone URL before it is passed to git.
   *
   * @param url - URL taken from a registry entry or `.gitmodules`
   * @returns The trimmed URL
   * @throws {Error} When the URL is empty or contains dangerous patterns
   */
  static validateCloneUrl(url: string): string {
    const sanitized = url.trim();
    if (!sanitized) {
      throw new Error('Clone URL is empty');
    }
    if (this.DANGEROUS_URL_PATTERNS.some(pattern => pattern.test(sanitized))) {
      throw new Error('Invalid clone URL: contains dangerous characters');
    }
    return sanitized;
  }

  /**
   * Sanitizes error messages to prevent information disclosure.
   *
   * Removes file paths and credentials embedded in URLs from error messages
   * before displaying them to users.
   *
   * @param error - Error object or string to sanitize
   * @returns Sanitized error message
   */
  static sanitizeErrorMessage(error: unknown): string {
    const message = error instanceof Error
      ? error.message
      : typeof error === 'string' ? error : 'Unknown error';

    return message
      .replace(/(https?:\/\/)[^/@\s]+@/g, '$1<credentials>@') // Remove credentials in URLs
      .replace(/(^|\s)\/[^\s]+/g, '$1<path>') // Remove file paths
      .substring(0, 200); // Limit message length
  }
}

/**
 * Utility functions for consistent error handling across the codebase.
 */
export class ErrorUtils {
  /**
   * Extracts error message from unknown error types consistently.
   */
  static extractErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Normalizes an unknown thrown value into an Error.
   */
  static toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  }

  /**
   * True for Node.js system errors carrying the given `code` (ENOENT, ...).
   */
  static hasCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
  }
}
