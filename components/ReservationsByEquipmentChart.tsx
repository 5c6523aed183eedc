"use client";

import { useEffect, useState } from "react";
import { Bar, BarChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";

type Point = { name: string; count: number };

const isSeries = (v: unknown): v is { labels: string[]; values: number[] } => {
  if (typeof v !== "object" || v === null || !("labels" in v) || !("values" in v)) return false;
  return Array.isArray(v.labels) && Array.isArray(v.values);
};

export default function ReservationsByEquipmentChart() {
  const [points, setPoints] = useState<Point[] | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    const load = async () => {
      const res = await fetch("/api/stats/reservations_by_equipment");
      if (!res.ok) { setError(`Could not load stats (${res.status})`); return; }
      const body: unknown = await res.json();
      if (!isSeries(body)) { setError("Unexpected stats response"); return; }
      setPoints(body.labels.map((name, i) => ({ name, count: Number(body.values[i] ?? 0) })));
    };
    load().catch((e: unknown) => setError(e instanceof Error ? e.message : String(e)));
  }, []);

  if (error) return <p className="subtle">{error}</p>;
  if (!points) return <p className="subtle">Loading…</p>;
  if (points.length === 0) return <p className="subtle">No reservations yet.</p>;

  return (
    <div style={{ width: '100%', height: 280 }}>
      <ResponsiveContainer>
        <BarChart data={points}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="name" />
          <YAxis allowDecimals={false} />
          <Tooltip />
          <Bar dataKey="count" fill="#2563eb" />
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
}
