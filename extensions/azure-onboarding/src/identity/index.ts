export { GraphIdentityDirectory, GraphRequestError, GRAPH_SCOPE } from "./directory.js";
export type { IdentityDirectory } from "./directory.js";
