export function nowIso(): string {
  return new Date().toISOString();
}

// Node's AggregateError from a refused dual-stack connect has an empty message
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    if (error.message) return error.message;
    const code: unknown = "code" in error ? error.code : undefined;
    return typeof code === "string" && code ? code : error.name;
  }
  return String(error);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

// Sortable local date-time, e.g. 20250614_093005
export function fileStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${day}_${time}`;
}
