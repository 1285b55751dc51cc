/**
 * Absolute webhook URL when a public base is configured, otherwise the path as-is
 * (Twilio resolves relative action URLs against the current request).
 */
export const abs = (p: string, baseUrl?: string) => {
  const path = p.startsWith('/') ? p : `/${p}`; // Ensure leading slash
  if (!baseUrl) return path;
  return `${baseUrl.replace(/\/$/, '')}${path}`;
};
