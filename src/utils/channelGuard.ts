/**
 * Clasificación de errores REST de Discord.
 *
 * Propósito: distinguir canal desconocido (10003) y fallos que vale la pena
 * reintentar (429, 5xx, red) sin depender de la clase concreta del error.
 * Invariantes: nunca lanza; un valor que no es objeto no es ni 10003 ni
 * transitorio.
 */

const TRANSIENT_NETWORK_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "EAI_AGAIN", "ECONNREFUSED"]);

const readField = (error: unknown, field: string): unknown => {
  if (!error || typeof error !== "object" || !(field in error)) return undefined;
  return Reflect.get(error, field);
};

const getDiscordErrorCode = (error: unknown): number | null => {
  const code = readField(error, "code");
  if (typeof code === "number") return code;
  if (typeof code === "string" && code.trim()) {
    const parsed = Number(code);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

const getHttpStatus = (error: unknown): number | null => {
  const status = readField(error, "status") ?? readField(error, "statusCode");
  return typeof status === "number" ? status : null;
};

export const isUnknownChannelError = (error: unknown): boolean => {
  return getDiscordErrorCode(error) === 10003 || getHttpStatus(error) === 404;
};

export const isTransientDiscordError = (error: unknown): boolean => {
  const status = getHttpStatus(error);
  if (status !== null) return status === 429 || status >= 500;

  const code = readField(error, "code");
  return typeof code === "string" && TRANSIENT_NETWORK_CODES.has(code);
};
