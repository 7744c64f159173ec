import http from 'node:http';
import https from 'node:https';
import { TLSSocket } from 'node:tls';

export interface ServedCertificate {
  subject: string;
  issuer: string;
  validFrom: Date;
  validTo: Date;
}

export interface ProbeResponse {
  status: number;
  location?: string;
  /** Present on HTTPS responses */
  certificate?: ServedCertificate;
}

export interface ProbeOptions {
  headers?: Readonly<Record<string, string>>;
  timeoutMs?: number;
}

export interface HttpProbe {
  get(url: string, options?: ProbeOptions): Promise<ProbeResponse>;
}

/**
 * Single GET without following redirects. The instance serves a self-signed
 * certificate, so HTTPS probes skip verification.
 */
export class NodeHttpProbe implements HttpProbe {
  get(url: string, options: ProbeOptions = {}): Promise<ProbeResponse> {
    const target = new URL(url);
    const transport = target.protocol === 'https:' ? https : http;

    return new Promise((resolve, reject) => {
      const request = transport.request(target, {
        method: 'GET',
        headers: options.headers,
        timeout: options.timeoutMs ?? 10_000,
        rejectUnauthorized: false
      }, response => {
        response.resume();
        resolve({
          status: response.statusCode ?? 0,
          location: response.headers.location,
          certificate: response.socket instanceof TLSSocket ? servedCertificate(response.socket) : undefined
        });
      });

      request.on('timeout', () => request.destroy(new Error(`GET ${url} timed out`)));
      request.on('error', reject);
      request.end();
    });
  }
}

function servedCertificate(socket: TLSSocket): ServedCertificate | undefined {
  const peer = socket.getPeerCertificate();
  // An empty object when the server sent none
  if (!peer.valid_to) {
    return undefined;
  }
  return {
    subject: peer.subject?.CN ?? '',
    issuer: peer.issuer?.CN ?? '',
    validFrom: new Date(peer.valid_from),
    validTo: new Date(peer.valid_to)
  };
}
