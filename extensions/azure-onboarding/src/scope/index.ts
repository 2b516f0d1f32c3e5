export {
  RESOURCE_TYPES,
  SCOPE_TEMPLATES,
  parseResourceType,
  resolveScope,
  resourceGroupScope,
  subscriptionScope,
} from "./resolver.js";
export type { ResourceType, ScopeParts, ScopeTemplate, ScopeResolution } from "./resolver.js";
