import { KeepAliveBot } from '../../src/index'
import { Config } from '../../src/interface/Config'
import { normalizeConfig } from '../../src/util/Load'

export const TARGET_URL = 'https://portal.example.test/login'

export const LOGIN_HTML = `<html><head><title>Client Login</title></head><body>
<form action="/dologin" method="post">
  <input type="email" name="email" id="inputEmail" placeholder="Email Address">
  <input type="password" name="password" id="inputPassword" placeholder="Password">
  <input type="hidden" name="token" value="abc">
  <button type="submit" id="login">Login</button>
</form>
</body></html>`

export const CHALLENGE_HTML = `<html><head><title>Just a moment...</title></head><body>
<div class="main-wrapper"><h2>Checking your browser before accessing portal.example.test</h2>
<iframe src="https://challenges.cloudflare.com/cdn-cgi/challenge-platform/turnstile/if/ov2"></iframe></div>
</body></html>`

export const BLANK_HTML = '<html><head><title>Welcome</title></head><body><p>Nothing to see here</p></body></html>'

export const DASHBOARD_HTML = `<html><head><title>Client Area</title></head><body>
<h1>Welcome back</h1>
<div class="panel"><span>Time until suspension</span> <span class="countdown">3d 4h 5m 6s</span></div>
</body></html>`

export const REJECTED_HTML = `<html><head><title>Client Login</title></head><body>
<div class="alert alert-danger">Login Details Incorrect. Please try again.</div>
<form><input type="email" name="email" id="inputEmail"><input type="password" name="password" id="inputPassword">
<button type="submit">Login</button></form>
</body></html>`

export function page(body: string, title = 'Page'): string {
    return `<html><head><title>${title}</title></head><body>${body}</body></html>`
}

/**
 * Defaults with every wait set to zero, diagnostics off and a short poll window.
 */
export function makeConfig(mutate?: (config: Config) => void): Config {
    const config = normalizeConfig({
        targetUrl: TARGET_URL,
        timeouts: {
            navigation: 1000,
            networkIdle: 0,
            pollWindow: 200,
            pollInterval: 0,
            fieldWait: 0,
            fillSettle: 0,
            submitClick: 0,
            challengeClick: 0,
            postSubmitNetworkIdle: 0,
            postSubmitSettle: 0,
            countdownWait: 0,
            attempt: 5000
        },
        retry: { maxAttempts: 2, backoffBase: 0, backoffStep: 0 },
        execution: { accountPause: 0 },
        diagnostics: { enabled: false, directory: '.' },
        logging: { file: false }
    })
    mutate?.(config)
    return config
}

export function makeBot(mutate?: (config: Config) => void): KeepAliveBot {
    return new KeepAliveBot(makeConfig(mutate))
}
