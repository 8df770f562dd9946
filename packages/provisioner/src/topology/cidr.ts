/**
 * IPv4 address and CIDR helpers
 */

export interface Ipv4Cidr {
  readonly network: number
  readonly prefix: number
}

const OCTET = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)$/

export function parseIpv4(value: string): number | null {
  const parts = value.split(".")
  if (parts.length !== 4 || !parts.every(p => OCTET.test(p))) {
    return null
  }
  return parts.reduce((acc, part) => acc * 256 + Number(part), 0)
}

export function formatIpv4(value: number): string {
  return [24, 16, 8, 0].map(shift => Math.floor(value / 2 ** shift) % 256).join(".")
}

/**
 * Parse "a.b.c.d/n". Host bits must be zero.
 */
export function parseCidr(value: string): Ipv4Cidr | null {
  const [address, prefixText, ...rest] = value.split("/")
  if (address === undefined || prefixText === undefined || rest.length > 0 || !/^\d{1,2}$/.test(prefixText)) {
    return null
  }
  const prefix = Number(prefixText)
  const network = parseIpv4(address)
  if (network === null || prefix > 32) {
    return null
  }
  const size = 2 ** (32 - prefix)
  if (network % size !== 0) {
    return null
  }
  return { network, prefix }
}

export function cidrContains(cidr: Ipv4Cidr, address: number): boolean {
  const size = 2 ** (32 - cidr.prefix)
  return address >= cidr.network && address < cidr.network + size
}

/**
 * True when `address` (dotted) falls inside `cidr` (text). Invalid input never matches.
 */
export function inCidr(address: string, cidr: string): boolean {
  const parsed = parseCidr(cidr)
  const ip = parseIpv4(address)
  return parsed !== null && ip !== null && cidrContains(parsed, ip)
}

export function broadcastAddress(cidr: Ipv4Cidr): number {
  return cidr.network + 2 ** (32 - cidr.prefix) - 1
}

/**
 * First address usable by a host: network+1, or the network itself on /31 and /32.
 */
export function firstHost(cidr: Ipv4Cidr): number {
  return cidr.prefix >= 31 ? cidr.network : cidr.network + 1
}
