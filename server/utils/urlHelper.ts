/**
 * URL Helper Utility
 */

/**
 * Strip trailing slashes from a base URL.
 */
export function trimTrailingSlash(url: string): string {
    return url.replace(/\/+$/, '');
}
