function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function getPgErrorInfo(err: unknown) {
  if (!isRecord(err)) return { code: null as string | null, constraint: null as string | null };
  const code = typeof err.code === "string" ? err.code : null;
  const constraint = typeof err.constraint === "string" ? err.constraint : null;
  return { code, constraint };
}

export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  const info = getPgErrorInfo(err);
  if (info.code !== "23505") return false;
  return constraint === undefined || info.constraint === constraint;
}

// Classes 08 (connexion) et 57P (arrêt serveur), plus les erreurs réseau de node.
const CONNECTION_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EHOSTUNREACH", "57P01", "57P02", "57P03"]);

export function isConnectionError(err: unknown): boolean {
  const { code } = getPgErrorInfo(err);
  if (code && (CONNECTION_CODES.has(code) || code.startsWith("08"))) return true;
  return err instanceof Error && /Connection terminated|connection timeout/i.test(err.message);
}

export function isTimeoutError(err: unknown): boolean {
  const { code } = getPgErrorInfo(err);
  if (code === "57014") return true;
  return err instanceof Error && /Query read timeout|timeout exceeded when trying to connect/i.test(err.message);
}
