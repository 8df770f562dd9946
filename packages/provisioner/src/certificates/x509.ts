import { isIP } from "node:net"
import forge from "node-forge"
import { DEFAULTS } from "@hostkit/shared"

const DAY_MS = 24 * 60 * 60 * 1000
const ORGANIZATION = "hostkit"

export interface CertificatePair {
  certPem: string
  keyPem: string
}

export interface ParsedCertificate {
  /** subjectAltName entries (DNS names and IP addresses), in certificate order */
  subjectNames: string[]
  commonName?: string
  issuerCommonName?: string
  notBefore: Date
  notAfter: Date
  serial: string
  fingerprint: string
  isCA: boolean
}

type AltName = { type: 2; value: string } | { type: 7; ip: string }

function altNamesFor(names: readonly string[]): AltName[] {
  return names.map(name => (isIP(name) !== 0 ? { type: 7, ip: name } : { type: 2, value: name }))
}

/** Positive, non-zero 128-bit serial */
function randomSerial(): string {
  return `01${forge.util.bytesToHex(forge.random.getBytesSync(15))}`
}

function generateKeys(bits: number): forge.pki.rsa.KeyPair {
  return forge.pki.rsa.generateKeyPair({ bits, e: 0x10001 })
}

function commonNameOf(attributes: forge.pki.Certificate["subject"]): string | undefined {
  const field: unknown = attributes.getField("CN")
  if (typeof field === "object" && field !== null && "value" in field && typeof field.value === "string") {
    return field.value
  }
  return undefined
}

function readAltNames(extension: unknown): string[] {
  if (typeof extension !== "object" || extension === null || !("altNames" in extension)) {
    return []
  }
  const altNames: unknown = extension.altNames
  if (!Array.isArray(altNames)) {
    return []
  }
  const names: string[] = []
  for (const entry of altNames) {
    if (typeof entry !== "object" || entry === null || !("type" in entry)) continue
    if (entry.type === 2 && "value" in entry && typeof entry.value === "string") {
      names.push(entry.value)
    } else if (entry.type === 7 && "ip" in entry && typeof entry.ip === "string") {
      names.push(entry.ip)
    }
  }
  return names
}

function readIsCA(extension: unknown): boolean {
  return typeof extension === "object" && extension !== null && "cA" in extension && extension.cA === true
}

export function fingerprintOf(cert: forge.pki.Certificate): string {
  const der = forge.asn1.toDer(forge.pki.certificateToAsn1(cert)).getBytes()
  return forge.md.sha256.create().update(der).digest().toHex()
}

/**
 * Parse a PEM certificate. Throws on anything forge cannot read.
 */
export function parseCertificate(pem: string): ParsedCertificate {
  const cert = forge.pki.certificateFromPem(pem)
  return {
    subjectNames: readAltNames(cert.getExtension("subjectAltName")),
    commonName: commonNameOf(cert.subject),
    issuerCommonName: commonNameOf(cert.issuer),
    notBefore: cert.validity.notBefore,
    notAfter: cert.validity.notAfter,
    serial: cert.serialNumber,
    fingerprint: fingerprintOf(cert),
    isCA: readIsCA(cert.getExtension("basicConstraints")),
  }
}

interface LeafOptions {
  subjectNames: readonly string[]
  validityDays: number
  now: Date
  keyBits?: number
}

function buildLeaf(options: LeafOptions): { cert: forge.pki.Certificate; keys: forge.pki.rsa.KeyPair } {
  const [commonName] = options.subjectNames
  if (!commonName) {
    throw new Error("certificate needs at least one subject name")
  }
  const keys = generateKeys(options.keyBits ?? DEFAULTS.RSA_KEY_BITS)
  const cert = forge.pki.createCertificate()
  cert.publicKey = keys.publicKey
  cert.serialNumber = randomSerial()
  cert.validity.notBefore = options.now
  cert.validity.notAfter = new Date(options.now.getTime() + options.validityDays * DAY_MS)
  cert.setSubject([
    { name: "commonName", value: commonName },
    { name: "organizationName", value: ORGANIZATION },
  ])
  cert.setExtensions([
    { name: "basicConstraints", cA: false },
    { name: "keyUsage", digitalSignature: true, keyEncipherment: true },
    { name: "extKeyUsage", serverAuth: true },
    { name: "subjectAltName", altNames: altNamesFor(options.subjectNames) },
    { name: "subjectKeyIdentifier" },
  ])
  return { cert, keys }
}

/**
 * Self-signed leaf whose SANs are exactly `subjectNames`.
 */
export function createSelfSigned(options: LeafOptions): CertificatePair {
  const { cert, keys } = buildLeaf(options)
  cert.setIssuer(cert.subject.attributes)
  cert.sign(keys.privateKey, forge.md.sha256.create())
  return {
    certPem: forge.pki.certificateToPem(cert),
    keyPem: forge.pki.privateKeyToPem(keys.privateKey),
  }
}

/**
 * Root CA for LocalCA zones
 */
export function createCertificateAuthority(options: {
  commonName: string
  validityYears: number
  now: Date
  keyBits?: number
}): CertificatePair {
  const keys = generateKeys(options.keyBits ?? DEFAULTS.RSA_KEY_BITS)
  const cert = forge.pki.createCertificate()
  cert.publicKey = keys.publicKey
  cert.serialNumber = randomSerial()
  cert.validity.notBefore = options.now
  const notAfter = new Date(options.now.getTime())
  notAfter.setUTCFullYear(notAfter.getUTCFullYear() + options.validityYears)
  cert.validity.notAfter = notAfter
  const attrs = [
    { name: "commonName", value: options.commonName },
    { name: "organizationName", value: ORGANIZATION },
  ]
  cert.setSubject(attrs)
  cert.setIssuer(attrs)
  cert.setExtensions([
    { name: "basicConstraints", cA: true, critical: true },
    { name: "keyUsage", keyCertSign: true, cRLSign: true, critical: true },
    { name: "subjectKeyIdentifier" },
  ])
  cert.sign(keys.privateKey, forge.md.sha256.create())
  return {
    certPem: forge.pki.certificateToPem(cert),
    keyPem: forge.pki.privateKeyToPem(keys.privateKey),
  }
}

/**
 * Leaf signed by the given CA.
 */
export function issueFromAuthority(ca: CertificatePair, options: LeafOptions): CertificatePair {
  const caCert = forge.pki.certificateFromPem(ca.certPem)
  const caKey = forge.pki.privateKeyFromPem(ca.keyPem)
  const { cert, keys } = buildLeaf(options)
  cert.setIssuer(caCert.subject.attributes)
  cert.sign(caKey, forge.md.sha256.create())
  return {
    certPem: forge.pki.certificateToPem(cert),
    keyPem: forge.pki.privateKeyToPem(keys.privateKey),
  }
}

/**
 * True when `issuerPem` signed `certPem`.
 */
export function isIssuedBy(certPem: string, issuerPem: string): boolean {
  try {
    return forge.pki.certificateFromPem(issuerPem).verify(forge.pki.certificateFromPem(certPem))
  } catch {
    return false
  }
}

export function daysUntil(date: Date, now: Date): number {
  return Math.floor((date.getTime() - now.getTime()) / DAY_MS)
}
