/**
 * Anti-bot interstitial markers. A page containing any of them (any case)
 * carries no market data, whatever its status code.
 */
export const CHALLENGE_MARKERS = ['just a moment', 'cf-mitigated', 'cf-browser-verification', 'cf-chl'] as const

export function isChallengePage(text: string): boolean {
  const lower = text.toLowerCase()
  return CHALLENGE_MARKERS.some(marker => lower.includes(marker))
}
