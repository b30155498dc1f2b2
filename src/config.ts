import type { ISessionOptions } from './interfaces';
import { DEFAULT_TIMEOUT } from './AxiosTransport';

export const DEFAULT_ADDRESS = '172.16.16.16';
export const DEFAULT_PORT = '4444';

function isEnabled(value?: string): boolean {
    return !!value && ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

export function loadSessionOptions(env: NodeJS.ProcessEnv = process.env): ISessionOptions {
    if (!env.FWXG_USERNAME) {
        throw new Error('please fill process.env.FWXG_USERNAME');
    }
    if (!env.FWXG_PASSWORD) {
        throw new Error('please fill process.env.FWXG_PASSWORD');
    }

    const timeout = Number(env.FWXG_TIMEOUT);

    return {
        username: env.FWXG_USERNAME,
        password: env.FWXG_PASSWORD,
        address: env.FWXG_ADDRESS || DEFAULT_ADDRESS,
        port: env.FWXG_PORT || DEFAULT_PORT,
        strictSSL: isEnabled(env.FWXG_STRICT_SSL),
        timeout: timeout > 0 ? timeout : DEFAULT_TIMEOUT
    };
}
