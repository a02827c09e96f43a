/**
 * Request shape of every bulk endpoint.
 *
 * Bulk operations differ per resource in verb, path and the key that carries
 * the ids, so they are listed here instead of derived from naming.
 */

export interface BulkEndpoint {
  method: 'DELETE' | 'POST';
  path: string;
  idsKey: string;
}

export const BULK_ENDPOINTS = {
  // ids travel in the body of a DELETE on the collection, not as query params
  deleteVNets: { method: 'DELETE', path: '/vnets', idsKey: 'ids' },
  stopActions: { method: 'POST', path: '/actions/stop', idsKey: 'action_ids' },
  resumeActions: { method: 'POST', path: '/actions/resume', idsKey: 'action_ids' },
} as const satisfies Record<string, BulkEndpoint>;
