export {
  AdminApiGateway,
  type AdminApiGatewayConfig,
  type QueryParams,
  type RequestOptions,
  type ResponseSchema,
} from './gateway.js';
export {
  StaticTokenProvider,
  CredentialTokenProvider,
  createInteractiveTokenProvider,
  type AccessTokenProvider,
  type InteractiveSignInOptions,
} from './auth.js';
export { listAllWorkspaces, toWorkspaceRef } from './workspaces.js';
export { ScanApi, scanQueryFlags } from './scans.js';
export { getRefreshHistory, refreshHistoryPath } from './refreshes.js';
export * from './types.js';
