/**
 * IPv6 literal normalization.
 *
 * Quagga prints IPv6 addresses lowercased with leading zeros dropped and the
 * longest zero run compressed. Config files written by hand rarely match that,
 * so both sides are rewritten the same way before they are compared.
 */

/**
 * Canonical text of an IPv6 address, or null when `word` is not one.
 * The WHATWG URL host serializer produces the RFC 5952 form.
 */
export function canonicalIpv6(word: string): string | null {
  if (!word.includes(":") || word.includes("[") || word.includes("]")) {
    return null;
  }
  try {
    const host = new URL(`http://[${word}]/`).hostname;
    return host.slice(1, -1);
  } catch {
    return null;
  }
}

/**
 * Rewrite every IPv6 literal in a line. Words that fail to parse are kept as-is.
 */
export function normalizeIpv6Line(line: string): string {
  return line
    .split(" ")
    .map((word) => canonicalIpv6(word) ?? word)
    .join(" ")
    .trim();
}
