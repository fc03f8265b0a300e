/**
 * Supabase REST snapshot source
 *
 * Reads the operational tables through Supabase's PostgREST endpoint and
 * folds them into a MetricsSnapshot.
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { aggregateSnapshot, emptySnapshot, startOfUtcDay } from "../../compute/snapshot.js";
import type {
  KitchenTicketRow,
  OrderRow,
  TableRow,
  TimeClockRow,
} from "../../compute/snapshot.js";
import { SnapshotSourceError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { SnapshotSource } from "../interface.js";
import type { MetricsSnapshot } from "../../types/metrics.js";

const OrderRowSchema: z.ZodType<OrderRow, z.ZodTypeDef, unknown> = z.object({
  status: z.string(),
  total_amount: z.union([z.number(), z.string()]).nullable(),
  created_at: z.string(),
});

const KitchenTicketRowSchema: z.ZodType<KitchenTicketRow, z.ZodTypeDef, unknown> = z.object({
  status: z.string(),
});

const TableRowSchema: z.ZodType<TableRow, z.ZodTypeDef, unknown> = z.object({
  status: z.string(),
});

const TimeClockRowSchema: z.ZodType<TimeClockRow, z.ZodTypeDef, unknown> = z.object({
  clock_out: z.string().nullable(),
  break_start: z.string().nullable(),
  break_end: z.string().nullable(),
});

export interface SupabaseSourceOptions {
  url: string;
  serviceKey: string;
  timeoutMs: number;
}

export class SupabaseSnapshotSource implements SnapshotSource {
  readonly name = "supabase";
  private readonly http: AxiosInstance;

  constructor(options: SupabaseSourceOptions, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: `${options.url.replace(/\/+$/, "")}/rest/v1`,
        timeout: options.timeoutMs,
        headers: {
          apikey: options.serviceKey,
          Authorization: `Bearer ${options.serviceKey}`,
          Accept: "application/json",
        },
      });
  }

  async computeSnapshot(tenantId: string): Promise<MetricsSnapshot> {
    const now = new Date();
    const tenantFilter = `eq.${tenantId}`;

    const [orders, kitchenTickets, tables, timeClock] = await Promise.all([
      this.select("orders", OrderRowSchema, {
        select: "status,total_amount,created_at",
        business_id: tenantFilter,
        created_at: `gte.${startOfUtcDay(now).toISOString()}`,
      }),
      this.select("kds_orders", KitchenTicketRowSchema, {
        select: "status",
        business_id: tenantFilter,
        status: "in.(pending,preparing)",
      }),
      this.select("tables", TableRowSchema, {
        select: "status",
        business_id: tenantFilter,
      }),
      this.select("time_clock", TimeClockRowSchema, {
        select: "clock_out,break_start,break_end",
        business_id: tenantFilter,
        clock_out: "is.null",
      }),
    ]);

    return aggregateSnapshot(tenantId, { orders, kitchenTickets, tables, timeClock }, now);
  }

  /**
   * GET one table with PostgREST filters.
   */
  private async select<T>(
    table: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: Record<string, string>
  ): Promise<T[]> {
    try {
      const response = await this.http.get<unknown>(`/${table}`, { params });
      const rows = z.array(schema).safeParse(response.data);
      if (!rows.success) {
        throw new SnapshotSourceError(table, `unexpected row shape: ${rows.error.issues[0]?.message ?? "invalid"}`);
      }
      return rows.data;
    } catch (error) {
      if (error instanceof SnapshotSourceError) {
        throw error;
      }
      const message = axios.isAxiosError(error)
        ? `${error.response?.status ?? error.code ?? "network error"}`
        : error instanceof Error
        ? error.message
        : String(error);
      logger.error("Supabase query failed", error, { table });
      throw new SnapshotSourceError(table, message, { cause: error });
    }
  }
}

/**
 * Source used when no store is configured: every tenant reads as idle.
 */
export class EmptySnapshotSource implements SnapshotSource {
  readonly name = "empty";

  computeSnapshot(tenantId: string): Promise<MetricsSnapshot> {
    return Promise.resolve(emptySnapshot(tenantId));
  }
}
