import { describe, expect, it } from 'vitest'
import {
  NegotiationRequestSchema,
  encodeClientCall,
  fromWire,
  rawDataToString,
  toWire,
} from './messages.js'

describe('relay wire messages', () => {
  it('maps envelopes to single-letter wire keys and back', () => {
    const envelope = {
      isServerCall: true,
      relayName: 'Chat',
      method: 'Say',
      arguments: ['room1', 'hi'],
      connectionID: 'conn-1',
    }

    const wire = toWire(envelope)
    expect(wire).toEqual({ S: true, R: 'Chat', M: 'Say', A: ['room1', 'hi'], C: 'conn-1' })
    expect(fromWire(wire)).toEqual(envelope)
  })

  it('encodes client calls without the server flag or connection id', () => {
    expect(encodeClientCall('Chat', 'Message', ['conn-1', 'hi'])).toBe(
      '{"R":"Chat","M":"Message","A":["conn-1","hi"]}'
    )
  })

  it('normalizes the requested transport name', () => {
    expect(NegotiationRequestSchema.parse({ T: '  LongPoll ' })).toEqual({ T: 'longpoll' })
    expect(NegotiationRequestSchema.parse({})).toEqual({})
  })

  it('reads text out of every socket payload shape', () => {
    expect(rawDataToString('plain')).toBe('plain')
    expect(rawDataToString(Buffer.from('buffer'))).toBe('buffer')
    expect(rawDataToString([Buffer.from('frag'), Buffer.from('ments')])).toBe('fragments')
    expect(rawDataToString(Uint8Array.from(Buffer.from('array')).buffer)).toBe('array')
  })
})
