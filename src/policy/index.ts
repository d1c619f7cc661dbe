export { PolicyStore, DEFAULT_POLICY_STORE_CONFIG, type PolicyStoreOptions } from './policy-store.js';
export { InMemoryPolicySource, HttpPolicySource, type HttpPolicySourceConfig } from './policy-source.js';
export {
  WILDCARD,
  policyKey,
  type Policy,
  type PolicyInput,
  type PolicyLookup,
  type PolicyMatch,
  type PolicySource,
  type PolicyStoreConfig,
} from './types.js';
