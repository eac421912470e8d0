import { ConfigError } from '../error/configError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Parses and normalizes a service endpoint.
 *
 * - Only `http:` and `https:` are accepted.
 * - Any query or fragment is dropped, then `api-version` is set as the only query parameter.
 * - The path always ends with `/`, so resource paths resolve beneath it.
 */
export function constructEndpoint(endpoint: string | URL, apiVersion: string): SafeWrap<ConfigError, URL> {
  const input = endpoint.toString();
  const [errParse, url] = safeWrap(() => new URL(input));
  if (errParse) {
    return [new ConfigError(`error parsing endpoint ${input}`, input, { cause: errParse }), null];
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    return [new ConfigError(`error unsupported endpoint protocol ${url.protocol}`, input), null];
  }

  url.hash = '';
  url.search = '';
  if (!url.pathname.endsWith('/')) {
    url.pathname = `${url.pathname}/`;
  }
  url.searchParams.set('api-version', apiVersion);

  return [null, url];
}

/**
 * Joins a collection prefix and a URL-escaped resource name beneath a normalized endpoint,
 * carrying the endpoint query (the API version) over to the result.
 *
 * Names that URL parsing would fold into another path (`.` and `..`, which stay dot segments
 * even when percent-encoded) are returned as an error.
 *
 * @example
 * constructResourceUrl(new URL('https://vault.example/?api-version=7.5'), 'secrets', 'db password')
 * // https://vault.example/secrets/db%20password?api-version=7.5
 */
export function constructResourceUrl(endpoint: URL, collection: string, name: string): SafeWrap<Error, URL> {
  const pathname = `${endpoint.pathname}${collection}/${encodeURIComponent(name)}`;
  const url = new URL(endpoint);
  url.pathname = pathname;

  if (url.pathname !== pathname) {
    return [new Error(`error resource name ${JSON.stringify(name)} is not a single path segment`), null];
  }

  return [null, url];
}
