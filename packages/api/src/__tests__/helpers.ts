import type { FastifyInstance } from 'fastify';

export interface MultipartPart {
  name: string;
  value: string | Buffer;
  filename?: string;
  contentType?: string;
}

const BOUNDARY = '----kiosk-test-boundary';

/**
 * Encode parts as multipart/form-data for app.inject. Parts are written in
 * order, so put text fields before the file they describe.
 */
export function multipartBody(parts: MultipartPart[]): { payload: Buffer; headers: Record<string, string> } {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    let head = `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${part.name}"`;
    if (part.filename !== undefined) head += `; filename="${part.filename}"`;
    head += '\r\n';
    if (part.contentType) head += `Content-Type: ${part.contentType}\r\n`;
    chunks.push(Buffer.from(`${head}\r\n`), Buffer.from(part.value), Buffer.from('\r\n'));
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));

  return {
    payload: Buffer.concat(chunks),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

export const VISITOR = {
  full_name: 'Avery Lin',
  email: 'avery@example.com',
  phone: '5550100',
  id_number: 'P1234567',
  host_email: 'jordan.reyes@example.com',
  purpose: 'Quarterly review',
};

/** Finalize a check-in through the API and return the parsed visit log. */
export async function checkInVisitor(
  app: FastifyInstance,
  overrides: Record<string, string> = {},
): Promise<{ id: number; status: string }> {
  const res = await app.inject({
    method: 'POST',
    url: '/api/visitor/checkin-finalize',
    payload: { ...VISITOR, ...overrides },
  });
  if (res.statusCode !== 200) {
    throw new Error(`checkInVisitor failed: HTTP ${res.statusCode} ${res.body}`);
  }
  return res.json();
}
