import Link from "next/link";
import { redirect } from "next/navigation";
import EquipmentForm from "@/components/EquipmentForm";
import FlashMessage from "@/components/FlashMessage";
import { createEquipmentAction } from "@/lib/actions/equipment.actions";
import { withFlash, type SearchParams } from "@/lib/flash";
import { requireIdentity } from "@/lib/session";

export default async function EquipmentCreatePage({ searchParams }: { searchParams: Promise<SearchParams> }) {
  const actor = await requireIdentity();
  if (!actor.isStaff) redirect(withFlash("/equipment", "danger", "Only staff may add equipment."));

  return (
    <div className="stack" style={{ maxWidth: 640 }}>
      <div style={{ display: 'flex', alignItems: 'baseline', gap: 12 }}>
        <h2 className="page-title">Add equipment</h2>
        <Link className="btn" href="/equipment">Back to list</Link>
      </div>
      <FlashMessage params={await searchParams} />
      <EquipmentForm equipment={null} action={createEquipmentAction} submitLabel="Add" />
    </div>
  );
}
