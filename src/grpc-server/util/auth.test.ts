import test from 'node:test'
import assert from 'node:assert/strict'
import { Metadata } from '@grpc/grpc-js'
import { ApiKeyAuthenticator, CALLER_METADATA_KEY, getCallerId } from './auth.js'

const keys = [
  { callerId: 'mobile', key: 'test-key-1' },
  { callerId: 'web', key: 'test-key-2' },
  { callerId: 'broken', key: '' },
]

test('authenticator ignores blank keys', () => {
  const auth = new ApiKeyAuthenticator(keys)
  assert.equal(auth.size, 2)
})

test('verify accepts configured keys and names the caller', () => {
  const auth = new ApiKeyAuthenticator(keys)
  assert.deepEqual(auth.verify('test-key-2'), { status: 'authenticated', callerId: 'web' })
})

test('verify rejects missing, empty and unknown keys', () => {
  const auth = new ApiKeyAuthenticator(keys)
  assert.deepEqual(auth.verify(undefined), { status: 'rejected' })
  assert.deepEqual(auth.verify(''), { status: 'rejected' })
  assert.deepEqual(auth.verify('test-key-3'), { status: 'rejected' })
  assert.deepEqual(auth.verify('test-key-1 '), { status: 'rejected' })
})

test('an empty allow-list rejects everything', () => {
  const auth = new ApiKeyAuthenticator([])
  assert.deepEqual(auth.verify('test-key-1'), { status: 'rejected' })
})

test('authenticate reads the configured metadata key', () => {
  const auth = new ApiKeyAuthenticator(keys, 'x-gateway-key')
  const md = new Metadata()
  md.set('api-key', 'test-key-1')
  assert.deepEqual(auth.authenticate(md), { status: 'rejected' })
  md.set('x-gateway-key', 'test-key-1')
  assert.deepEqual(auth.authenticate(md), { status: 'authenticated', callerId: 'mobile' })
})

test('getCallerId falls back to anonymous', () => {
  const md = new Metadata()
  assert.equal(getCallerId(md), 'anonymous')
  md.set(CALLER_METADATA_KEY, 'mobile')
  assert.equal(getCallerId(md), 'mobile')
})
