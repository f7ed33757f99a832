/**
 * Status of an error raised with a 4xx `status` or `statusCode` (Express
 * itself raises these, e.g. for an undecodable path parameter).
 */
export function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) {
    return undefined;
  }
  const status: unknown = Reflect.get(err, 'status') ?? Reflect.get(err, 'statusCode');
  if (typeof status === 'number' && Number.isInteger(status) && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
}
