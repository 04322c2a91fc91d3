import crypto from 'node:crypto'
import type { JwtAlgorithm } from './jwt.ts'

export interface SigningKeyPair {
  algorithm: JwtAlgorithm
  /** PKCS#8 PEM */
  privateKey: string
  /** SPKI PEM */
  publicKey: string
}

const PEM_ENCODING: {
  publicKeyEncoding: { type: 'spki'; format: 'pem' }
  privateKeyEncoding: crypto.BasePrivateKeyEncodingOptions<'pem'> & {
    type: 'pkcs8'
  }
} = {
  publicKeyEncoding: { type: 'spki', format: 'pem' },
  privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
}

/**
 * Generates a PEM key pair for the given algorithm. Used for development
 * when no key pair is configured, and by tests.
 */
export const generateSigningKeyPair = (
  algorithm: JwtAlgorithm = 'EdDSA',
): SigningKeyPair => {
  switch (algorithm) {
    case 'EdDSA': {
      const { publicKey, privateKey } = crypto.generateKeyPairSync(
        'ed25519',
        PEM_ENCODING,
      )
      return { algorithm, publicKey, privateKey }
    }
    case 'ES256': {
      const { publicKey, privateKey } = crypto.generateKeyPairSync('ec', {
        namedCurve: 'prime256v1',
        ...PEM_ENCODING,
      })
      return { algorithm, publicKey, privateKey }
    }
    case 'RS256': {
      const { publicKey, privateKey } = crypto.generateKeyPairSync('rsa', {
        modulusLength: 2048,
        ...PEM_ENCODING,
      })
      return { algorithm, publicKey, privateKey }
    }
  }
}

/**
 * Maps a key to the one signature algorithm it is used with.
 */
export const algorithmForKey = (key: crypto.KeyObject): JwtAlgorithm => {
  switch (key.asymmetricKeyType) {
    case 'ed25519':
      return 'EdDSA'
    case 'ec': {
      const curve = key.asymmetricKeyDetails?.namedCurve
      if (curve !== 'prime256v1') {
        throw new Error(`Unsupported EC curve for signing: ${String(curve)}`)
      }
      return 'ES256'
    }
    case 'rsa':
      return 'RS256'
    default:
      throw new Error(
        `Unsupported signing key type: ${String(key.asymmetricKeyType)}`,
      )
  }
}
