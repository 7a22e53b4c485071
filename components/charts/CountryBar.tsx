"use client";

import { Bar } from "react-chartjs-2";
import type { ValueCount } from "@/lib/articles/types";
import "./register";

export default function CountryBar({ countries }: { countries: ValueCount[] }) {
  return (
    <div className="card">
      <h3 style={{ marginTop: 0 }}>Top {countries.length || ""} Countries by Article Count</h3>
      <Bar
        data={{
          labels: countries.map((c) => c.label),
          datasets: [
            {
              label: "Count",
              data: countries.map((c) => c.count),
              backgroundColor: "rgba(30, 144, 255, 0.6)",
            },
          ],
        }}
        options={{
          plugins: { legend: { display: false } },
          scales: { y: { beginAtZero: true, ticks: { precision: 0 } } },
        }}
      />
    </div>
  );
}
