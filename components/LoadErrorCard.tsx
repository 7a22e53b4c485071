import type { DatasetLoadError } from "@/lib/errors";

export default function LoadErrorCard({ error }: { error: DatasetLoadError }) {
  return (
    <div className="card" role="alert" style={{ borderColor: "#ff6b6b" }}>
      <h3 style={{ marginTop: 0, color: "#ff6b6b" }}>Could not load articles</h3>
      <p style={{ margin: 0 }}>{error.message}</p>
      <p style={{ marginBottom: 0, fontSize: 14, opacity: 0.7 }}>
        {`Error code: ${error.code}`}
      </p>
    </div>
  );
}
