/**
 * @kitchen-sim/core/node
 *
 * Node.js-only exports. These use `node:fs` and `node:http`. Import from this
 * subpath in process entry points.
 *
 * @example
 * ```typescript
 * import { startLocalServer, loadEnvFile } from '@kitchen-sim/core/node';
 * ```
 *
 * @packageDocumentation
 */

export {
  startLocalServer,
  loadEnvFile,
  type LocalServerOptions,
  type LocalServerHandle,
  type UpgradeHandler,
} from './server/local-server.js';
