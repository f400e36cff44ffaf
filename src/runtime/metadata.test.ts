import { describe, expect, it } from 'vitest'
import { FakeHttpClient } from '../testing/fakes'
import { FALLBACK_HOST, resolvePublicHost } from './metadata'

const METADATA_URL = 'http://169.254.169.254/latest/meta-data/public-ipv4'

describe('resolvePublicHost', () => {
  it('prefers the configured override', async () => {
    const http = new FakeHttpClient().serve(METADATA_URL, '203.0.113.10')

    const host = await resolvePublicHost(
      { publicHost: 'ci.example.test', metadataUrl: METADATA_URL, httpTimeoutMs: 1000 },
      http
    )

    expect(host).toBe('ci.example.test')
    expect(http.requests).toEqual([])
  })

  it('reads the address from the metadata service', async () => {
    const http = new FakeHttpClient().serve(METADATA_URL, '203.0.113.10\n')

    expect(await resolvePublicHost({ metadataUrl: METADATA_URL, httpTimeoutMs: 1000 }, http)).toBe('203.0.113.10')
  })

  it('falls back when the metadata service is unreachable or empty', async () => {
    const unreachable = new FakeHttpClient().failWith(METADATA_URL, 'connect EHOSTUNREACH')
    const empty = new FakeHttpClient().serve(METADATA_URL, '')

    expect(await resolvePublicHost({ metadataUrl: METADATA_URL, httpTimeoutMs: 1000 }, unreachable)).toBe(FALLBACK_HOST)
    expect(await resolvePublicHost({ metadataUrl: METADATA_URL, httpTimeoutMs: 1000 }, empty)).toBe(FALLBACK_HOST)
  })
})
