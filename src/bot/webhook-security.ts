import crypto from "node:crypto";

export const WEBEX_SIGNATURE_HEADER = "x-spark-signature";

export function computeWebexSignature(secret: string, rawBody: Buffer | string): string {
  return crypto.createHmac("sha1", secret).update(rawBody).digest("hex");
}

/**
 * Checks the `X-Spark-Signature` header Webex sets when a webhook carries a
 * secret: the hex HMAC-SHA1 of the raw request body.
 */
export function verifyWebexSignature(params: {
  secret: string;
  rawBody: Buffer | string;
  signature: string | string[] | undefined;
}): boolean {
  const header = Array.isArray(params.signature) ? params.signature[0] : params.signature;
  const provided = header?.trim().toLowerCase();
  if (!provided) return false;
  const expected = computeWebexSignature(params.secret, params.rawBody);
  const a = Buffer.from(provided, "utf8");
  const b = Buffer.from(expected, "utf8");
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(a, b);
}
