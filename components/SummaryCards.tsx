import type { SummaryStats } from "@/lib/articles/types";

const CARDS: { key: keyof SummaryStats; title: string }[] = [
  { key: "totalArticles", title: "Total Articles" },
  { key: "uniqueSources", title: "Unique Sources" },
  { key: "uniqueCountries", title: "Countries Covered" },
];

export default function SummaryCards({ summary }: { summary: SummaryStats }) {
  return (
    <div className="grid" style={{ gridTemplateColumns: "repeat(3, 1fr)" }}>
      {CARDS.map(({ key, title }) => (
        <div key={key} className="card" data-testid={key}>
          <div style={{ fontSize: 14, opacity: 0.8 }}>{title}</div>
          <h4 style={{ fontSize: 28, margin: "8px 0 0" }}>{summary[key]}</h4>
        </div>
      ))}
    </div>
  );
}
