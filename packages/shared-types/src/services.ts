/**
 * Service kinds a cluster node can advertise.
 *
 * `kv` is reached over the binary protocol; every other kind is an HTTP
 * service.
 *
 * @public
 * @stability stable
 */
export const ServiceType = {
  KV: 'kv',
  MGMT: 'mgmt',
  QUERY: 'query',
  ANALYTICS: 'analytics',
  SEARCH: 'search',
  VIEWS: 'views',
} as const;

export type ServiceType = typeof ServiceType[keyof typeof ServiceType];

/**
 * All service kinds, in a stable order.
 * @public
 */
export const ALL_SERVICE_TYPES: readonly ServiceType[] = Object.freeze(Object.values(ServiceType));

/**
 * Type guard for ServiceType values.
 * @public
 */
export function isServiceType(value: unknown): value is ServiceType {
  return typeof value === 'string' && ALL_SERVICE_TYPES.some(service => service === value);
}

/**
 * Whether the service is spoken over HTTP rather than the binary protocol.
 * @public
 */
export function isHttpService(service: ServiceType): boolean {
  return service !== ServiceType.KV;
}
