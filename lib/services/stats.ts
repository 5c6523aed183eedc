import type { InventoryStore, ReservationStore } from "@/lib/store";

export type ChartSeries = {
  labels: string[];
  values: number[];
};

/** Reservation item counts per equipment, for items reserved at least once. */
export async function reservationsByEquipment(
  store: Pick<InventoryStore, "listEquipment"> & Pick<ReservationStore, "countItemsByEquipment">
): Promise<ChartSeries> {
  const [equipment, counts] = await Promise.all([store.listEquipment(), store.countItemsByEquipment()]);
  const countById = new Map(counts.map(c => [c.equipment_id, c.count]));
  const rows = equipment.filter(e => (countById.get(e.id) ?? 0) > 0);
  return {
    labels: rows.map(e => e.name),
    values: rows.map(e => countById.get(e.id) ?? 0)
  };
}
