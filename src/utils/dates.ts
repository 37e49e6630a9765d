/** Date locale au format YYYY-MM-DD (précision jour). */
export function toIsoDate(d: Date): string {
  const yyyy = d.getFullYear();
  const mm = String(d.getMonth() + 1).padStart(2, "0");
  const dd = String(d.getDate()).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}`;
}

export function formatDateFR(iso: string | null | undefined): string {
  if (!iso) return "-";
  const raw = String(iso);
  const m = raw.match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (m) return `${m[3]}/${m[2]}/${m[1]}`;

  const d = new Date(raw);
  if (Number.isNaN(d.getTime())) return raw;
  const dd = String(d.getDate()).padStart(2, "0");
  const mm = String(d.getMonth() + 1).padStart(2, "0");
  return `${dd}/${mm}/${d.getFullYear()}`;
}

/** 20260314_091502 : horodatage utilisé dans les noms de fichiers. */
export function fileTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${toIsoDate(d).replace(/-/g, "")}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}
