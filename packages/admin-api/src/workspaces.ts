import {
  ADMIN_API_PATHS,
  WORKSPACE_PAGE_SIZE,
  isJsonObject,
  nullLogger,
  readBoolean,
  readString,
  type JsonObject,
  type Logger,
  type WorkspaceRef,
} from '@scan-harvest/shared';
import type { AdminApiGateway } from './gateway.js';
import { listEnvelopeSchema } from './types.js';

export function toWorkspaceRef(item: JsonObject): WorkspaceRef | null {
  const id = readString(item, 'id');
  if (!id) return null;
  return {
    id,
    name: readString(item, 'name') ?? '',
    state: readString(item, 'state'),
    type: readString(item, 'type'),
    isOnDedicatedCapacity: readBoolean(item, 'isOnDedicatedCapacity') ?? false,
    capacityId: readString(item, 'capacityId'),
  };
}

/**
 * Pages the admin workspace listing with `$top`/`$skip`.
 *
 * Keeps requesting while the previous page came back full; a short or empty
 * page ends the listing. An empty tenant view yields [].
 */
export async function listAllWorkspaces(
  gateway: AdminApiGateway,
  options: { pageSize?: number; logger?: Logger } = {}
): Promise<WorkspaceRef[]> {
  const pageSize = options.pageSize ?? WORKSPACE_PAGE_SIZE;
  const log = options.logger ?? nullLogger;
  const workspaces: WorkspaceRef[] = [];
  let skip = 0;

  for (;;) {
    const page = await gateway.get(ADMIN_API_PATHS.WORKSPACES, listEnvelopeSchema, {
      query: { $top: pageSize, $skip: skip },
    });
    const items = page.value ?? [];

    for (const item of items) {
      if (!isJsonObject(item)) continue;
      const ref = toWorkspaceRef(item);
      if (ref) {
        workspaces.push(ref);
      } else {
        log.warn('Skipping workspace entry without id', { skip });
      }
    }

    log.debug('Workspace page fetched', { skip, pageItems: items.length });

    if (items.length < pageSize) break;
    skip += pageSize;
  }

  log.info('Workspaces enumerated', { total: workspaces.length });
  return workspaces;
}
