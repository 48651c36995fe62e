/**
 * Target URL construction from the operator's host and path arguments.
 */

export function buildTargetUrl(host: string, path: string): string {
  const trimmed = host.trim();
  if (!trimmed) {
    throw new Error("Target host must not be empty");
  }

  const base = /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  let parsed: URL;
  try {
    parsed = new URL(base);
  } catch {
    throw new Error(`Invalid target host: ${host}`);
  }

  if (parsed.pathname !== "/" || parsed.search || parsed.hash) {
    throw new Error(
      `Target host must not include a path or query, use --path instead: ${host}`,
    );
  }

  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  return `${parsed.origin}${normalizedPath}`;
}
