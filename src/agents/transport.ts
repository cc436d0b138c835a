// ═══════════════════════════════════════════════════════════════
// Agents :: HTTP Transport
// One POST per call, no redirects, body read under a byte cap
// ═══════════════════════════════════════════════════════════════

import { OversizedResponseError, TransportError, WardenError, errorMessage } from '../core/errors.js';

export interface AgentCallPayload {
  toolName: string;
  arguments: Readonly<Record<string, unknown>>;
  correlationId: string;
}

export interface AgentHttpResponse {
  status: number;
  body: string;
}

/**
 * One POST to an agent endpoint. Must honor `signal`, and must reject with
 * OversizedResponseError once the body passes `maxBodyBytes`.
 */
export interface AgentTransport {
  post(url: string, payload: AgentCallPayload, signal: AbortSignal, maxBodyBytes: number): Promise<AgentHttpResponse>;
}

export class HttpAgentTransport implements AgentTransport {
  async post(url: string, payload: AgentCallPayload, signal: AbortSignal, maxBodyBytes: number): Promise<AgentHttpResponse> {
    try {
      const resp = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-Correlation-Id': payload.correlationId,
        },
        body: JSON.stringify(payload),
        redirect: 'manual',
        signal,
      });

      if (resp.type === 'opaqueredirect' || (resp.status >= 300 && resp.status < 400)) {
        await resp.body?.cancel();
        throw new TransportError(`agent redirected with HTTP ${resp.status}; redirects are not followed`);
      }

      const declared = Number(resp.headers.get('content-length'));
      if (Number.isFinite(declared) && declared > maxBodyBytes) {
        await resp.body?.cancel();
        throw new OversizedResponseError(maxBodyBytes);
      }

      return { status: resp.status, body: await readCapped(resp, maxBodyBytes) };
    } catch (err) {
      // The deadline's own TimeoutError surfaces through the abort reason.
      if (signal.aborted) throw signal.reason;
      if (err instanceof WardenError) throw err;
      throw new TransportError(`POST ${url} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

async function readCapped(resp: Response, maxBytes: number): Promise<string> {
  if (!resp.body) return '';
  const reader = resp.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw new OversizedResponseError(maxBytes);
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks).toString('utf8');
}
