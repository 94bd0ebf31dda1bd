import type { IFetcher } from '../../Platform/Ports.js';
import { ErrorCode, KernelError } from '../../kernel-core/Errors.js';

export class HttpFetcher implements IFetcher {
    constructor(private readonly timeoutMs: number = 10_000) { }

    async fetchJson(endpoint: string): Promise<unknown> {
        let res: Response;
        try {
            res = await fetch(endpoint, {
                headers: { accept: 'application/json' },
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (e) {
            throw new KernelError(ErrorCode.NETWORK_FAILURE, `Fetch failed for ${endpoint}: ${e instanceof Error ? e.message : String(e)}`, { operation: 'io.fetch' }, { cause: e });
        }
        if (!res.ok) {
            throw new KernelError(ErrorCode.NETWORK_FAILURE, `Endpoint ${endpoint} answered ${res.status}`, { operation: 'io.fetch' });
        }
        try {
            return await res.json();
        } catch (e) {
            throw new KernelError(ErrorCode.MALFORMED_PAYLOAD, `Endpoint ${endpoint} did not return JSON`, { operation: 'io.fetch' }, { cause: e });
        }
    }
}
