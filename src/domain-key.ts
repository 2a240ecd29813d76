import { getDomain, getHostname } from "tldts";

/**
 * Maps an endpoint URL to the registrable domain it is grouped under,
 * e.g. `https://api.shop.example.co.uk:8080/x` becomes `example.co.uk`.
 *
 * Lookups use the ICANN section of the public suffix list, so multi-label
 * suffixes such as `co.uk` are kept whole. Hosts without a registrable
 * domain (IP addresses, `localhost`) are grouped by hostname; input that
 * does not parse at all is grouped under itself.
 */
export function extractDomain(url: string): string {
  const trimmed = url.trim();

  const domain = getDomain(trimmed);
  if (domain) {
    return domain;
  }

  const hostname = getHostname(trimmed);
  if (hostname) {
    return hostname;
  }

  return trimmed;
}
