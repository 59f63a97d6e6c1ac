function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

/** Group thousands: 1234567 -> "1,234,567". */
export function formatCount(value: number): string {
  const safe = Number.isFinite(value) ? Math.max(0, Math.round(value)) : 0;
  return String(safe).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

/** Compact count for narrow columns: 950 -> "950", 12345 -> "12.3K". */
export function formatCompact(value: number): string {
  const safe = Number.isFinite(value) ? Math.max(0, Math.round(value)) : 0;
  if (safe >= 1_000_000) return `${(safe / 1_000_000).toFixed(1)}M`;
  if (safe >= 10_000) return `${(safe / 1_000).toFixed(1)}K`;
  return String(safe);
}

export function formatPercent(value: number): string {
  const safe = Number.isFinite(value) ? clamp(value, 0, 100) : 0;
  return `${safe.toFixed(1)}%`;
}

export function formatUptime(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds <= 0) return "N/A";
  const days = Math.floor(seconds / 86_400);
  const hours = Math.floor((seconds % 86_400) / 3_600);
  const mins = Math.floor((seconds % 3_600) / 60);
  if (days > 0) return `${days}d ${hours}h ${mins}m`;
  return `${hours}h ${mins}m`;
}

export function formatTemperature(celsius: number): string {
  if (!Number.isFinite(celsius) || celsius <= 0) return "N/A";
  return `${celsius.toFixed(1)}C`;
}

export function formatTimeout(minutes: number): string {
  return minutes === 0 ? "NEVER" : `${minutes}M`;
}

export function formatInterval(seconds: number): string {
  return `${seconds}S`;
}

export function formatOnOff(value: boolean): string {
  return value ? "ON" : "OFF";
}

/** Cut `text` to `width` cells, marking the cut with "~". */
export function truncate(text: string, width: number): string {
  if (width <= 0) return "";
  if (text.length <= width) return text;
  if (width === 1) return "~";
  return `${text.slice(0, width - 1)}~`;
}

export function ratioPercent(part: number, whole: number): number {
  if (!Number.isFinite(part) || !Number.isFinite(whole) || whole <= 0) return 0;
  return clamp((part / whole) * 100, 0, 100);
}
