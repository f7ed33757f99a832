/**
 * Response helpers shared by the CLI commands.
 */

export function isJsonResponse(res: Response): boolean {
  return (res.headers.get('content-type') ?? '').includes('application/json');
}

/**
 * Parsed JSON body, or `undefined` when the reply is not JSON or the body
 * cannot be read or parsed.
 */
export async function readJsonBody(res: Response): Promise<unknown> {
  if (!isJsonResponse(res)) {
    return undefined;
  }
  try {
    const body: unknown = await res.json();
    return body;
  } catch {
    return undefined;
  }
}

export function stringField(body: unknown, key: string): string | undefined {
  if (typeof body === 'object' && body !== null) {
    const value: unknown = Reflect.get(body, key);
    if (typeof value === 'string') return value;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
