/**
 * Connection and partition types shared by the registry, sessions and the
 * socket server.
 */

export type ChannelKind = "dashboard" | "kitchen-display" | "table-view";

/**
 * Broadcast grouping. `subKey` is the station for kitchen displays and the
 * location for table views; connections without one share the channel-wide
 * partition.
 */
export interface PartitionKey {
  tenantId: string;
  channel: ChannelKind;
  subKey?: string;
}

/**
 * What a connection must offer to be held in the registry.
 */
export interface FrameTarget {
  readonly id: string;
  /** Queue an already-serialized frame. Throws if the frame cannot be accepted. */
  sendSerialized(data: string): void;
}

export type SessionState = "connecting" | "connected" | "idle" | "processing" | "closed";

export interface RegistryStats {
  partitions: number;
  connections: number;
  byChannel: Record<ChannelKind, number>;
}

const TENANT_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function isValidTenantId(value: string): boolean {
  return TENANT_ID_PATTERN.test(value);
}

/**
 * Stable string form of a partition key, e.g. `kitchen-display:t1:grill`.
 * Components are URI-encoded so a ':' inside an id cannot collide.
 */
export function partitionId(key: PartitionKey): string {
  const base = `${key.channel}:${encodeURIComponent(key.tenantId)}`;
  return key.subKey === undefined ? base : `${base}:${encodeURIComponent(key.subKey)}`;
}
