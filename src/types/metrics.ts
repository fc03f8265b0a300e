/**
 * Aggregated operational snapshot served to clients on connect.
 */
export interface MetricsSnapshot {
  tenantId: string;
  orders: {
    active: number;          // pending, active or preparing
    completedToday: number;
    pendingKitchen: number;  // kitchen tickets not yet ready
  };
  revenue: {
    today: number;
    thisHour: number;
  };
  tables: {
    available: number;
    occupied: number;
    reserved: number;
  };
  staff: {
    clockedIn: number;
    onBreak: number;
  };
  generatedAt: string;       // ISO-8601
}
