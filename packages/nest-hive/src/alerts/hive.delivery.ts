import { Agent, IncomingMessage, request as httpRequest, RequestOptions } from 'node:http';
import { request as httpsRequest } from 'node:https';
import { HttpProxyAgent } from 'http-proxy-agent';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { AlertDelivery, HiveAlertPayload } from './alerter.interface';
import { DeliveryError } from '../errors';
import { HiveResolvedConnection } from '../module/options';
import { canonicalJson } from '../utils/canonical';

const ALERT_PATH = '/api/alert';

/** Posts alert payloads to `{host}:{port}/api/alert` with bearer authentication. */
export class HiveDeliveryClient implements AlertDelivery {
  constructor(private readonly connection: HiveResolvedConnection) {}

  /** Full endpoint URL built from the configured host and port. */
  get endpoint(): string {
    return `${this.connection.host}:${this.connection.port}${ALERT_PATH}`;
  }

  /**
   * Sends one payload. Resolves on any 2xx status; rejects with `DeliveryError`
   * on transport errors, timeouts and other statuses. Never retries.
   */
  async deliver(payload: HiveAlertPayload): Promise<void> {
    const body = canonicalJson(payload);
    const url = this.parseEndpoint();
    const secure = url.protocol === 'https:';
    const timeoutMs = this.connection.timeoutMs;

    const options: RequestOptions & { rejectUnauthorized?: boolean } = {
      method: 'POST',
      hostname: url.hostname,
      port: url.port || (secure ? 443 : 80),
      path: `${url.pathname}${url.search}`,
      headers: {
        'Content-Type': 'application/json',
        'Content-Length': Buffer.byteLength(body),
        Authorization: `Bearer ${this.connection.apiKey}`,
      },
      agent: this.proxyAgent(secure),
    };
    if (secure) {
      options.rejectUnauthorized = this.connection.verifyTLS;
    }

    await new Promise<void>((resolve, reject) => {
      const onResponse = (res: IncomingMessage): void => {
        res.resume();
        const status = res.statusCode ?? 500;
        if (status >= 200 && status < 300) {
          resolve();
          return;
        }
        const reason = `${status} ${res.statusMessage ?? ''}`.trim();
        reject(new DeliveryError(`Error posting to TheHive: HTTP ${reason}`, { status }));
      };

      const req = secure ? httpsRequest(options, onResponse) : httpRequest(options, onResponse);
      req.on('error', (error) => {
        reject(new DeliveryError(`Error posting to TheHive: ${error.message}`, { cause: error }));
      });
      req.setTimeout(timeoutMs, () => {
        req.destroy(new Error(`request timed out after ${timeoutMs}ms`));
      });
      req.write(body);
      req.end();
    });
  }

  private parseEndpoint(): URL {
    let url: URL;
    try {
      url = new URL(this.endpoint);
    } catch (error) {
      throw new DeliveryError(`Error posting to TheHive: invalid endpoint ${this.endpoint}`, { cause: error });
    }

    // `localhost:9000/...` parses with protocol `localhost:`
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new DeliveryError(
        `Error posting to TheHive: host must start with http:// or https:// (got ${this.connection.host})`,
      );
    }
    return url;
  }

  private proxyAgent(secure: boolean): Agent | undefined {
    const proxy = secure ? this.connection.proxies.https : this.connection.proxies.http;
    if (!proxy) {
      return undefined;
    }
    return secure ? new HttpsProxyAgent(proxy) : new HttpProxyAgent(proxy);
  }
}
