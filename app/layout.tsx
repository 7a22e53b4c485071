import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Global News Dashboard",
  description: "Summary statistics, sentiment and keywords over a CSV of news articles",
};

export default function RootLayout({
  children,
}: Readonly<{ children: React.ReactNode }>) {
  return (
    <html lang="en">
      <body>
        <div style={{ maxWidth: 1200, margin: "0 auto", padding: "24px" }}>
          {children}
        </div>
      </body>
    </html>
  );
}
