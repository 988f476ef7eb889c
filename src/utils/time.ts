function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function dateParts(date: Date): { day: string; time: string[] } {
  return {
    day: `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`,
    time: [pad(date.getHours()), pad(date.getMinutes()), pad(date.getSeconds())],
  };
}

/** Local time, e.g. 2026-10-19 14:03:07 */
export function formatTimestamp(date: Date): string {
  const { day, time } = dateParts(date);
  return `${day} ${time.join(":")}`;
}

/** Local time safe for file names, e.g. 2026-10-19_14-03-07 */
export function formatFileTimestamp(date: Date): string {
  const { day, time } = dateParts(date);
  return `${day}_${time.join("-")}`;
}
