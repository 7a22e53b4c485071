"use client";

import { Pie } from "react-chartjs-2";
import type { ValueCount } from "@/lib/articles/types";
import { paletteFor } from "./register";

export default function SentimentPie({ slices }: { slices: ValueCount[] }) {
  return (
    <div className="card">
      <h3 style={{ marginTop: 0 }}>Sentiment Distribution</h3>
      {slices.length ? (
        <Pie
          data={{
            labels: slices.map((s) => s.label),
            datasets: [
              {
                label: "Articles",
                data: slices.map((s) => s.count),
                backgroundColor: paletteFor(slices.length),
              },
            ],
          }}
          options={{ plugins: { legend: { position: "bottom" } } }}
        />
      ) : (
        <p style={{ opacity: 0.7 }}>No articles</p>
      )}
    </div>
  );
}
