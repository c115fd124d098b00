import test from 'node:test'
import assert from 'node:assert/strict'
import { setTimeout as sleep } from 'node:timers/promises'
import { pino } from 'pino'
import { GatewayError, ProviderError } from '../errors.js'
import { failures, findDuplicateId, processBatch, type BatchOptions } from './batch.js'

const log = pino({ level: 'silent' })
const opts: BatchOptions = { concurrency: 4, itemTimeoutMs: 1000, log }

function never(signal: AbortSignal): Promise<string> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true })
  })
}

test('processBatch returns one success per item in input order', async () => {
  const items = [
    { id: '1', label: 'L1' },
    { id: '2', label: 'L2' },
  ]
  const outcomes = await processBatch(items, async (item) => `V${item.label}`, opts)
  assert.deepEqual(outcomes, [
    { id: '1', label: 'L1', result: { status: 'success', value: 'VL1' } },
    { id: '2', label: 'L2', result: { status: 'success', value: 'VL2' } },
  ])
})

test('processBatch keeps input order when later items finish first', async () => {
  const items = [
    { id: 'slow', label: 'a', delay: 30 },
    { id: 'mid', label: 'b', delay: 15 },
    { id: 'fast', label: 'c', delay: 0 },
  ]
  const finished: string[] = []
  const outcomes = await processBatch(
    items,
    async (item) => {
      await sleep(item.delay)
      finished.push(item.id)
      return item.label
    },
    opts,
  )
  assert.deepEqual(finished, ['fast', 'mid', 'slow'])
  assert.deepEqual(
    outcomes.map((o) => o.id),
    ['slow', 'mid', 'fast'],
  )
})

test('processBatch returns nothing for an empty batch without calling the provider', async () => {
  let calls = 0
  const outcomes = await processBatch([], async () => {
    calls++
    return 'x'
  }, opts)
  assert.deepEqual(outcomes, [])
  assert.equal(calls, 0)
})

test('processBatch rejects duplicate ids before any provider call', async () => {
  let calls = 0
  const items = [
    { id: 'a', label: 'x' },
    { id: 'b', label: 'y' },
    { id: 'a', label: 'z' },
  ]
  await assert.rejects(
    processBatch(items, async () => {
      calls++
      return 'x'
    }, opts),
    (err: unknown) => {
      assert.ok(err instanceof GatewayError)
      assert.equal(err.kind, 'InvalidArgument')
      assert.equal(err.message, 'duplicate item id: a')
      return true
    },
  )
  assert.equal(calls, 0)
})

test('one failing item does not affect its siblings', async () => {
  const items = [
    { id: 'a', label: 'one' },
    { id: 'b', label: 'two' },
    { id: 'c', label: 'three' },
  ]
  const outcomes = await processBatch(
    items,
    async (item) => {
      if (item.id === 'b') throw new ProviderError('ProviderUnavailable', 'openai API error: 500')
      return item.label.toUpperCase()
    },
    opts,
  )
  assert.deepEqual(
    outcomes.map((o) => o.result),
    [
      { status: 'success', value: 'ONE' },
      { status: 'failure', kind: 'ProviderUnavailable', message: 'openai API error: 500' },
      { status: 'success', value: 'THREE' },
    ],
  )
  assert.deepEqual(
    failures(outcomes).map((f) => f.id),
    ['b'],
  )
})

test('an item past its deadline fails with ProviderTimeout and its signal is aborted', async () => {
  let timedOutSignal: AbortSignal | undefined
  const items = [
    { id: 'stuck', label: 'a' },
    { id: 'quick', label: 'b' },
  ]
  const outcomes = await processBatch(
    items,
    (item, signal) => {
      if (item.id === 'stuck') {
        timedOutSignal = signal
        return never(signal)
      }
      return Promise.resolve('done')
    },
    { ...opts, itemTimeoutMs: 20 },
  )
  assert.deepEqual(outcomes[0].result, {
    status: 'failure',
    kind: 'ProviderTimeout',
    message: 'provider call timed out after 20ms',
  })
  assert.deepEqual(outcomes[1].result, { status: 'success', value: 'done' })
  assert.equal(timedOutSignal?.aborted, true)
})

test('unexpected errors become Internal without leaking their message', async () => {
  const outcomes = await processBatch(
    [{ id: 'a', label: 'x' }],
    () => {
      throw new TypeError('secret detail')
    },
    opts,
  )
  assert.deepEqual(outcomes[0].result, { status: 'failure', kind: 'Internal', message: 'internal error' })
})

test('concurrency bounds the number of in-flight provider calls', async () => {
  const items = Array.from({ length: 6 }, (_, i) => ({ id: String(i), label: `L${i}` }))
  let inFlight = 0
  let peak = 0
  const outcomes = await processBatch(
    items,
    async (item) => {
      inFlight++
      peak = Math.max(peak, inFlight)
      await sleep(5)
      inFlight--
      return item.label
    },
    { ...opts, concurrency: 2 },
  )
  assert.equal(peak, 2)
  assert.equal(outcomes.length, 6)
})

test('a cancelled call rejects with Cancelled and aborts in-flight items', async () => {
  const controller = new AbortController()
  const seen: AbortSignal[] = []
  const items = [
    { id: 'a', label: 'x' },
    { id: 'b', label: 'y' },
  ]
  const run = processBatch(
    items,
    (_item, signal) => {
      seen.push(signal)
      return never(signal)
    },
    { ...opts, signal: controller.signal },
  )
  setTimeout(() => controller.abort(), 10)
  await assert.rejects(run, (err: unknown) => {
    assert.ok(err instanceof GatewayError)
    assert.equal(err.kind, 'Cancelled')
    return true
  })
  assert.equal(seen.length, 2)
  assert.ok(seen.every((s) => s.aborted))
})

test('cancellation does not wait for an item that ignores its signal', async () => {
  const controller = new AbortController()
  const run = processBatch(
    [{ id: 'a', label: 'x' }],
    () => new Promise<string>((resolve) => setTimeout(() => resolve('late'), 200)),
    { ...opts, signal: controller.signal },
  )
  const started = Date.now()
  setTimeout(() => controller.abort(), 10)
  await assert.rejects(run, (err: unknown) => err instanceof GatewayError && err.kind === 'Cancelled')
  assert.ok(Date.now() - started < 150)
})

test('findDuplicateId reports the first repeated id', () => {
  assert.equal(findDuplicateId([{ id: 'a', label: '' }, { id: 'b', label: '' }]), undefined)
  assert.equal(findDuplicateId([{ id: 'a', label: '' }, { id: 'b', label: '' }, { id: 'b', label: '' }]), 'b')
})
