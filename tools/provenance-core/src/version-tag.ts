const VERSION_SEPARATOR = "__";

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Filesystem-safe local timestamp, `YYYYMMDD_HHMMSS`.
 */
export function formatTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new Error("Cannot format an invalid date");
  }

  const yyyy = date.getFullYear().toString().padStart(4, "0");
  const mm = pad(date.getMonth() + 1);
  const dd = pad(date.getDate());
  const hh = pad(date.getHours());
  const mi = pad(date.getMinutes());
  const ss = pad(date.getSeconds());

  return `${yyyy}${mm}${dd}_${hh}${mi}${ss}`;
}

export function buildVersionTag(prefix: string, timestamp: string): string {
  const trimmed = prefix.trim();
  if (!trimmed) {
    throw new Error("Version prefix is required");
  }
  return `${trimmed}_${timestamp}`;
}

export function versionedName(version: string, fileName: string): string {
  return `${version}${VERSION_SEPARATOR}${fileName}`;
}

