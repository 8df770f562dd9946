import { resolve4 } from "node:dns/promises"

/**
 * A-record lookup. Swapped for a fake in tests.
 */
export type DnsResolver = (hostname: string) => Promise<string[]>

export const systemResolver: DnsResolver = hostname => resolve4(hostname)
