export { IdentityResolver, parseAccountDatabase } from './identity_resolver';
export type { IdentityResolverOptions } from './identity_resolver';
