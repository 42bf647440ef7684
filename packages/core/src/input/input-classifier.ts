export type ClassifiedInput =
  | { readonly kind: 'url'; readonly url: URL }
  | { readonly kind: 'text'; readonly text: string };

function parseAbsoluteUrl(value: string): URL | undefined {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return undefined;
  }
  // "Lunch: noon" parses with scheme "lunch" and no host
  return url.host.length > 0 ? url : undefined;
}

/**
 * Decides whether submitted text points at a page or describes an event.
 * Only a complete absolute URL with a host counts as a page reference.
 */
export function classifyInput(raw: string): ClassifiedInput {
  const text = raw.trim();
  const url = parseAbsoluteUrl(text);
  if (url) {
    return { kind: 'url', url };
  }
  return { kind: 'text', text };
}
