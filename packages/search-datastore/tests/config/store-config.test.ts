/**
 * @file Store configuration tests
 */

import { describe, it, expect } from 'vitest'
import { loadStoreConfig, parseStoreConfig } from '../../src/config/store-config.js'
import { ConfigurationError } from '../../src/errors/index.js'

describe('parseStoreConfig', () => {
  it('should fill in defaults', () => {
    expect(parseStoreConfig()).toEqual({
      transportTimeout: 90,
      rootCaPath: '/etc/ssl/datastore/root-ca.crt',
      verifyCerts: true,
      maxRetryBackoff: 10,
    })
  })

  it('should keep provided values', () => {
    expect(parseStoreConfig({ transportTimeout: 5, verifyCerts: false })).toMatchObject({
      transportTimeout: 5,
      verifyCerts: false,
    })
  })

  it('should list every invalid setting', () => {
    let caught: unknown
    try {
      parseStoreConfig({ transportTimeout: -1, rootCaPath: '' })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ConfigurationError)
    expect(caught).toMatchObject({
      issues: [
        'transportTimeout: Number must be greater than 0',
        'rootCaPath: String must contain at least 1 character(s)',
      ],
    })
  })
})

describe('loadStoreConfig', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadStoreConfig({})).toEqual(parseStoreConfig())
  })

  it('should map environment variables', () => {
    expect(
      loadStoreConfig({
        DATASTORE_TRANSPORT_TIMEOUT: '30',
        DATASTORE_ROOT_CA_PATH: '/tmp/ca.pem',
        DATASTORE_VERIFY_CERTS: 'False',
      })
    ).toEqual({
      transportTimeout: 30,
      rootCaPath: '/tmp/ca.pem',
      verifyCerts: false,
      maxRetryBackoff: 10,
    })
  })

  it('should enable verification for any casing of true', () => {
    expect(loadStoreConfig({ DATASTORE_VERIFY_CERTS: 'TRUE' }).verifyCerts).toBe(true)
  })

  it('should reject a non-numeric timeout', () => {
    expect(() => loadStoreConfig({ DATASTORE_TRANSPORT_TIMEOUT: 'soon' })).toThrow(ConfigurationError)
  })
})
