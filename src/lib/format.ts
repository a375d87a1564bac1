export function renderDetails(rows: Array<[string, string]>): string {
  if (rows.length === 0) {
    return "";
  }
  const width = Math.max(...rows.map(([label]) => label.length)) + 1;
  return rows.map(([label, value]) => `${`${label}:`.padEnd(width)} ${value}`).join("\n");
}

export function formatDuration(hours?: number): string {
  if (typeof hours !== "number" || !Number.isFinite(hours)) {
    return "-";
  }

  const totalMinutes = Math.max(0, Math.floor(hours * 60));
  const days = Math.floor(totalMinutes / 1440);
  const remainingHours = Math.floor((totalMinutes % 1440) / 60);
  const minutes = totalMinutes % 60;

  if (days > 0) {
    return `${days}d ${remainingHours}h ${minutes}m`;
  }
  if (remainingHours > 0) {
    return `${remainingHours}h ${minutes}m`;
  }
  return `${minutes}m`;
}

export function formatTimestamp(value?: Date): string {
  return value ? value.toISOString() : "-";
}
