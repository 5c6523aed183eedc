import { NotFoundError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import { requireStaff, type Identity } from "@/lib/roles";
import type { InventoryStore } from "@/lib/store";
import type { Equipment } from "@/lib/types";
import { equipmentSchema, validate, type EquipmentFormInput } from "@/lib/validation";

const log = createLogger("equipment");

export async function listEquipment(store: InventoryStore): Promise<Equipment[]> {
  return store.listEquipment();
}

export async function getEquipment(store: InventoryStore, id: string): Promise<Equipment> {
  const eq = await store.getEquipment(id);
  if (!eq) throw new NotFoundError("Equipment");
  return eq;
}

export async function createEquipment(store: InventoryStore, actor: Identity, input: EquipmentFormInput): Promise<Equipment> {
  requireStaff(actor, "Only staff may add equipment.");
  const eq = await store.insertEquipment(validate(equipmentSchema, input));
  log.info("equipment created", { id: eq.id, by: actor.userId });
  return eq;
}

export async function updateEquipment(
  store: InventoryStore,
  actor: Identity,
  id: string,
  input: EquipmentFormInput
): Promise<Equipment> {
  requireStaff(actor, "Only staff may edit equipment.");
  await getEquipment(store, id);
  const eq = await store.updateEquipment(id, validate(equipmentSchema, input));
  if (!eq) throw new NotFoundError("Equipment");
  return eq;
}

export async function deleteEquipment(store: InventoryStore, actor: Identity, id: string): Promise<void> {
  requireStaff(actor, "Only staff may delete equipment.");
  const removed = await store.deleteEquipment(id);
  if (!removed) throw new NotFoundError("Equipment");
  log.info("equipment deleted", { id, by: actor.userId });
}
