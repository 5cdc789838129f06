import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios'
import { HttpProxyAgent } from 'http-proxy-agent'
import { HttpsProxyAgent } from 'https-proxy-agent'
import { SocksProxyAgent } from 'socks-proxy-agent'

export interface HttpClient {
    request(config: AxiosRequestConfig): Promise<AxiosResponse>
}

export type ProxyAgent = HttpProxyAgent<string> | HttpsProxyAgent<string> | SocksProxyAgent

const SOCKS_PROTOCOLS = ['socks://', 'socks4://', 'socks5://', 'socks5h://']
export const SUPPORTED_PROXY_PROTOCOLS = ['http://', 'https://', ...SOCKS_PROTOCOLS]

export function isSupportedProxyUrl(proxyUrl: string): boolean {
    return SUPPORTED_PROXY_PROTOCOLS.some(protocol => proxyUrl.startsWith(protocol))
}

export function getAgentForProxy(proxyUrl: string): ProxyAgent {
    switch (true) {
        case proxyUrl.startsWith('http://'):
            return new HttpProxyAgent(proxyUrl)
        case proxyUrl.startsWith('https://'):
            return new HttpsProxyAgent(proxyUrl)
        case SOCKS_PROTOCOLS.some(protocol => proxyUrl.startsWith(protocol)):
            return new SocksProxyAgent(proxyUrl)
        default:
            throw new Error(`Unsupported proxy protocol in "${proxyUrl}". Supported: ${SUPPORTED_PROXY_PROTOCOLS.join(', ')}`)
    }
}

// Proxy URLs may carry credentials
export function describeProxy(proxyUrl: string): string {
    try {
        const url = new URL(proxyUrl)
        return `${url.protocol}//${url.host}`
    } catch {
        return 'invalid proxy URL'
    }
}

function errorCode(err: unknown): string | undefined {
    if (axios.isAxiosError(err)) return err.code
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code
    return undefined
}

/**
 * Outbound HTTP for notifications. Only these requests go through the configured
 * proxy; the browser always connects directly.
 */
class AxiosClient implements HttpClient {
    private instance: AxiosInstance
    private proxied: boolean

    constructor(proxyUrl?: string) {
        this.instance = axios.create()
        this.proxied = false

        if (proxyUrl) {
            const agent = getAgentForProxy(proxyUrl)
            this.instance.defaults.httpAgent = agent
            this.instance.defaults.httpsAgent = agent
            this.instance.defaults.proxy = false
            this.proxied = true
        }
    }

    get usesProxy(): boolean {
        return this.proxied
    }

    public async request(config: AxiosRequestConfig, bypassProxy = false): Promise<AxiosResponse> {
        if (bypassProxy || !this.proxied) {
            return this.instance.request(config)
        }

        const maxAttempts = 2
        let lastError: unknown

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                return await this.instance.request(config)
            } catch (err: unknown) {
                lastError = err

                // Proxy authentication failure (407): go direct
                if (axios.isAxiosError(err) && err.response?.status === 407) {
                    return axios.create().request(config)
                }

                const code = errorCode(err)
                const isNetErr = code === 'ECONNREFUSED' || code === 'ETIMEDOUT' || code === 'ECONNRESET' || code === 'ENOTFOUND'
                const looksLikeProxyIssue = err instanceof Error && /proxy|tunnel|socks|agent/i.test(err.message)

                if (isNetErr || looksLikeProxyIssue) {
                    if (attempt < maxAttempts) {
                        await this.sleep(1000 * Math.pow(2, attempt - 1))
                        continue
                    }
                    // Last resort: try without the proxy
                    return axios.create().request(config)
                }

                throw err
            }
        }

        throw lastError
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms))
    }
}

export default AxiosClient
