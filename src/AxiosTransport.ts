import axios, { AxiosInstance } from 'axios';
import https from 'https';
import type { ITransport } from './interfaces';
import { TransportError } from './Errors/TransportError';

export const DEFAULT_TIMEOUT = 10000;

/**
 * Plain GET transport. Self-signed appliance certificates are accepted when
 * the caller asks to skip verification.
 */
export class AxiosTransport implements ITransport {
    private readonly agents: { strict: https.Agent; insecure: https.Agent };

    constructor(
        readonly timeout: number = DEFAULT_TIMEOUT,
        private readonly instance: AxiosInstance = axios.create()
    ) {
        this.agents = {
            strict: new https.Agent({ rejectUnauthorized: true, keepAlive: true }),
            insecure: new https.Agent({ rejectUnauthorized: false, keepAlive: true })
        };
    }

    public async send(url: string, skipTLSVerification: boolean): Promise<string> {
        try {
            const response = await this.instance.get<string>(url, {
                timeout: this.timeout,
                responseType: 'text',
                transformResponse: (data: unknown) => data,
                httpsAgent: skipTLSVerification ? this.agents.insecure : this.agents.strict
            });

            return typeof response.data === 'string' ? response.data : String(response.data);
        } catch (e) {
            if (axios.isAxiosError(e)) {
                throw new TransportError(`request to appliance failed : ${e.message}`, e, e.response?.status);
            }
            throw new TransportError(`request to appliance failed : ${String(e)}`, e);
        }
    }

    public destroy(): void {
        this.agents.strict.destroy();
        this.agents.insecure.destroy();
    }
}
