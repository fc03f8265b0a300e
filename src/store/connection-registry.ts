/**
 * Connection Registry
 *
 * Live connections grouped by partition (tenant, channel[, sub-key]).
 * Every method runs to completion on the event loop, so a partition is never
 * observed half-mutated and unrelated partitions never wait on each other.
 */

import { EventEmitter } from "eventemitter3";
import { logger } from "../utils/logger.js";
import {
  partitionId,
  type ChannelKind,
  type FrameTarget,
  type PartitionKey,
  type RegistryStats,
} from "../types/realtime.js";
import type { ServerFrame } from "../types/events.js";

interface Partition {
  key: PartitionKey;
  connections: Set<FrameTarget>;
}

export interface RegistryEvents {
  partitionCreated: (key: PartitionKey) => void;
  partitionRemoved: (key: PartitionKey) => void;
  connectionFailed: (connectionId: string, key: PartitionKey, error: unknown) => void;
}

export class ConnectionRegistry extends EventEmitter<RegistryEvents> {
  private partitions: Map<string, Partition> = new Map();

  /**
   * Add a connection to a partition, creating the partition on first use.
   * Registering the same connection twice is a no-op; returns whether the
   * connection was added.
   */
  register(connection: FrameTarget, key: PartitionKey): boolean {
    const id = partitionId(key);
    let partition = this.partitions.get(id);

    if (!partition) {
      partition = { key: { ...key }, connections: new Set() };
      this.partitions.set(id, partition);
      this.emit("partitionCreated", partition.key);
    }

    if (partition.connections.has(connection)) {
      return false;
    }

    partition.connections.add(connection);
    logger.debug("Connection registered", {
      connectionId: connection.id,
      partition: id,
      partitionSize: partition.connections.size,
    });
    return true;
  }

  /**
   * Remove a connection. Unknown connections and partitions are ignored.
   * The partition itself goes away with its last connection.
   */
  deregister(connection: FrameTarget, key: PartitionKey): boolean {
    const id = partitionId(key);
    const partition = this.partitions.get(id);
    if (!partition || !partition.connections.delete(connection)) {
      return false;
    }

    if (partition.connections.size === 0) {
      this.partitions.delete(id);
      this.emit("partitionRemoved", partition.key);
    }

    logger.debug("Connection deregistered", {
      connectionId: connection.id,
      partition: id,
      partitionSize: partition.connections.size,
    });
    return true;
  }

  /**
   * Send a frame to every connection in the partition.
   *
   * Connections that reject the frame are removed once the pass is over.
   * Returns the number of connections the frame was queued on.
   */
  broadcast(key: PartitionKey, frame: ServerFrame): number {
    const id = partitionId(key);
    const partition = this.partitions.get(id);
    if (!partition) {
      return 0;
    }

    let data: string;
    try {
      data = JSON.stringify(frame);
    } catch (error) {
      logger.error("Failed to serialize broadcast frame", error, { partition: id });
      return 0;
    }

    const recipients = Array.from(partition.connections);
    const failed: FrameTarget[] = [];
    let sentCount = 0;

    for (const connection of recipients) {
      try {
        connection.sendSerialized(data);
        sentCount++;
      } catch (error) {
        failed.push(connection);
        this.emit("connectionFailed", connection.id, partition.key, error);
        logger.warn("Broadcast delivery failed", {
          connectionId: connection.id,
          partition: id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    for (const connection of failed) {
      this.deregister(connection, key);
    }

    if (sentCount > 0) {
      logger.debug("Broadcast message", { partition: id, sentCount, failedCount: failed.length });
    }

    return sentCount;
  }

  count(key: PartitionKey): number {
    return this.partitions.get(partitionId(key))?.connections.size ?? 0;
  }

  /**
   * Active partitions. Empty partitions never appear here.
   */
  listPartitions(): PartitionKey[] {
    return Array.from(this.partitions.values(), (partition) => ({ ...partition.key }));
  }

  getStats(): RegistryStats {
    const byChannel: Record<ChannelKind, number> = {
      dashboard: 0,
      "kitchen-display": 0,
      "table-view": 0,
    };
    let connections = 0;

    for (const partition of this.partitions.values()) {
      byChannel[partition.key.channel] += partition.connections.size;
      connections += partition.connections.size;
    }

    return {
      partitions: this.partitions.size,
      connections,
      byChannel,
    };
  }
}
