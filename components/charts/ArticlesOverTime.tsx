"use client";

import { Line } from "react-chartjs-2";
import type { DatePoint } from "@/lib/articles/types";
import "./register";

export default function ArticlesOverTime({ points }: { points: DatePoint[] }) {
  return (
    <div className="card">
      <h3 style={{ marginTop: 0 }}>Articles Over Time</h3>
      <Line
        data={{
          labels: points.map((p) => p.date),
          datasets: [
            {
              label: "Articles",
              data: points.map((p) => p.count),
              borderColor: "rgba(30, 144, 255, 1)",
              backgroundColor: "rgba(30, 144, 255, 0.3)",
              tension: 0.2,
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
