export const DEFAULT_IMAGE_PARAMS: ReadonlyArray<readonly [string, string]> = [
  ['auto', 'format'],
  ['q', '80'],
  ['w', '1200'],
];

/**
 * Adds the default format, quality and width parameters that are missing.
 * Parameters already on the URL keep their values and order. Strings that
 * do not parse as URLs are returned unchanged.
 */
export function normalizeImageUrl(rawUrl: string): string {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    return rawUrl;
  }

  for (const [key, value] of DEFAULT_IMAGE_PARAMS) {
    if (!url.searchParams.has(key)) {
      url.searchParams.set(key, value);
    }
  }
  return url.toString();
}
