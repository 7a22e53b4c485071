import type { ValueCount } from "@/lib/articles/types";

export default function TopKeywords({ keywords }: { keywords: ValueCount[] }) {
  return (
    <div className="card">
      <h3 style={{ marginTop: 0 }}>Top Keywords</h3>
      {keywords.length ? (
        <ul style={{ margin: 0 }}>
          {keywords.map((k) => (
            <li key={k.label}>
              {`${k.label}: ${k.count}`}
            </li>
          ))}
        </ul>
      ) : (
        <p style={{ margin: 0, opacity: 0.7 }}>No keywords</p>
      )}
    </div>
  );
}
