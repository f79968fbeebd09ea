/**
 * Query Types
 *
 * Shapes shared by the tool layer, the fetch orchestrator and the upstream
 * transport.
 *
 * @module types/query
 */

/**
 * Logical request categories served by the upstream sports-data API.
 */
export type QueryFamily =
  | 'teams'
  | 'fixtures'
  | 'team_statistics'
  | 'standings'
  | 'head2head'
  | 'predictions';

export const QUERY_FAMILIES: readonly QueryFamily[] = [
  'teams',
  'fixtures',
  'team_statistics',
  'standings',
  'head2head',
  'predictions',
];

export type QueryParamValue = string | number | boolean | null | undefined;

/**
 * Query parameters as handed to the orchestrator. `undefined` and `null`
 * values are treated as absent.
 */
export type QueryParams = Readonly<Record<string, QueryParamValue>>;

/**
 * Canonical identity of a query.
 *
 * `key` is what the cache and the in-flight registry index by; `canonical`
 * is the normalized parameter string the key was hashed from, kept so a key
 * collision between distinct queries can be detected.
 */
export interface QueryFingerprint {
  readonly key: string;
  readonly family: QueryFamily;
  readonly canonical: string;
}

/**
 * Capability supplied by the transport: "go get this from the network".
 *
 * Implementations reject with `TransportFailureError`, `QuotaRejectedError`
 * or `UpstreamError` (see api/errors).
 */
export type UpstreamCall<TPayload> = (
  family: QueryFamily,
  params: QueryParams,
  signal?: AbortSignal
) => Promise<TPayload>;
