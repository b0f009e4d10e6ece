import { createHmac, timingSafeEqual } from "node:crypto";

import type { Request } from "express";

const HMAC_KEY = "crm-connect-compare";

/** Constant-time string equality; digests first so lengths never leak. */
export function safeStringEquals(left: string, right: string): boolean {
  const leftDigest = createHmac("sha256", HMAC_KEY).update(left).digest();
  const rightDigest = createHmac("sha256", HMAC_KEY).update(right).digest();
  return timingSafeEqual(leftDigest, rightDigest);
}

export function maybeString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

/** Honors `trust proxy`, so behind a proxy this is the forwarded client address. */
export function getClientIp(request: Request): string | undefined {
  return request.ip || request.socket.remoteAddress || undefined;
}

function escapeHtml(text: string): string {
  return text
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");
}

/** Page served to the OAuth popup once the connection is stored. */
export function renderCloseWindowPage(title: string, message: string): string {
  const safeTitle = escapeHtml(title);
  const safeMessage = escapeHtml(message);
  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>${safeTitle}</title>
  </head>
  <body>
    <p>${safeMessage}</p>
    <script>
      window.close();
    </script>
  </body>
</html>`;
}
