import {
  Chart as ChartJS,
  ArcElement,
  BarElement,
  CategoryScale,
  Legend,
  LinearScale,
  LineElement,
  PointElement,
  Title,
  Tooltip,
} from "chart.js";

ChartJS.register(
  ArcElement,
  BarElement,
  CategoryScale,
  LinearScale,
  LineElement,
  PointElement,
  Title,
  Tooltip,
  Legend
);

export const PALETTE = [
  "rgba(30, 144, 255, 0.7)",
  "rgba(255, 107, 107, 0.7)",
  "rgba(72, 199, 142, 0.7)",
  "rgba(255, 193, 7, 0.7)",
  "rgba(155, 89, 182, 0.7)",
  "rgba(0, 188, 212, 0.7)",
  "rgba(255, 152, 0, 0.7)",
  "rgba(121, 134, 203, 0.7)",
];

export function paletteFor(count: number): string[] {
  return Array.from({ length: count }, (_, i) => PALETTE[i % PALETTE.length]);
}
