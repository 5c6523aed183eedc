import type { Equipment } from "@/lib/types";

type Props = {
  equipment: Equipment | null;
  action: (formData: FormData) => Promise<void>;
  submitLabel: string;
};

export default function EquipmentForm({ equipment, action, submitLabel }: Props) {
  return (
    <form action={action} className="form-grid card">
      <label>
        Name
        <input name="name" defaultValue={equipment?.name ?? ""} required />
      </label>
      <label>
        Category
        <input name="category" defaultValue={equipment?.category ?? ""} required />
      </label>
      <label>
        Serial number
        <input name="serial_number" defaultValue={equipment?.serial_number ?? ""} required />
      </label>
      <label>
        Condition
        <select name="condition" defaultValue={equipment?.condition ?? "Good"}>
          {["Good", "Fair", "Damaged", "Under Repair", "Retired"].map(c => <option key={c} value={c}>{c}</option>)}
        </select>
      </label>
      <label>
        Location
        <input name="location" defaultValue={equipment?.location ?? ""} required />
      </label>
      <label>
        Daily limit (concurrent bookings)
        <input type="number" min={1} name="daily_limit" defaultValue={equipment?.daily_limit ?? 1} />
      </label>
      <div><button className="btn primary" type="submit">{submitLabel}</button></div>
    </form>
  );
}
