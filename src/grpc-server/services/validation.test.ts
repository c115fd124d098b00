import test from 'node:test'
import assert from 'node:assert/strict'
import { GatewayError } from '../../errors.js'
import {
  AudioTranscriptionRequest,
  HelloRequest,
  ImageAnalysisRequest,
  NoteGenerationRequest,
  formatPath,
  parseRequest,
} from './validation.js'

function invalid(message: string) {
  return (err: unknown) => {
    assert.ok(err instanceof GatewayError)
    assert.equal(err.kind, 'InvalidArgument')
    assert.equal(err.message, message)
    return true
  }
}

test('formatPath renders zod paths', () => {
  assert.equal(formatPath(['items', 1, 'id']), 'items[1].id')
  assert.equal(formatPath(['items']), 'items')
  assert.equal(formatPath([]), '')
})

test('note items default guide and sample and keep ids verbatim', () => {
  const parsed = parseRequest(NoteGenerationRequest, { items: [{ id: ' a ', label: 'Title' }] })
  assert.deepEqual(parsed, { items: [{ id: ' a ', label: 'Title', guide: '', sample: '' }] })
})

test('a missing request or item list is an empty batch', () => {
  assert.deepEqual(parseRequest(NoteGenerationRequest, undefined), { items: [] })
  assert.deepEqual(parseRequest(NoteGenerationRequest, {}), { items: [] })
})

test('duplicate ids name the offending item', () => {
  const request = {
    items: [
      { id: 'a', label: 'x' },
      { id: 'a', label: 'y' },
    ],
  }
  assert.throws(() => parseRequest(NoteGenerationRequest, request), invalid('items[1].id: duplicate item id: a'))
})

test('blank labels and ids are rejected', () => {
  assert.throws(
    () => parseRequest(NoteGenerationRequest, { items: [{ id: 'a', label: '   ' }] }),
    invalid('items[0].label: label is required'),
  )
  assert.throws(
    () => parseRequest(NoteGenerationRequest, { items: [{ id: '', label: 'x' }] }),
    invalid('items[0].id: id is required'),
  )
})

test('a non-list items field is rejected', () => {
  assert.throws(
    () => parseRequest(NoteGenerationRequest, { items: 'nope' }),
    invalid('items: Expected array, received string'),
  )
})

test('image items default their mime type and require bytes', () => {
  const image = Buffer.from([1, 2, 3])
  const parsed = parseRequest(ImageAnalysisRequest, { items: [{ id: 'a', label: 'x', images: [image], mimeTypes: [''] }] })
  assert.deepEqual(parsed.items[0].images, [{ data: image, mimeType: 'image/png' }])
  assert.equal(parsed.items[0].prompt, '')

  assert.throws(
    () => parseRequest(ImageAnalysisRequest, { items: [{ id: 'a', label: 'x', images: [image, new Uint8Array(0)] }] }),
    invalid('items[0].images[1]: must not be empty'),
  )
  assert.throws(
    () => parseRequest(ImageAnalysisRequest, { items: [{ id: 'a', label: 'x', images: [image], mimeTypes: ['audio/wav'] }] }),
    invalid('items[0].mimeTypes[0]: must be an image/* type'),
  )
})

test('image items need at least one image', () => {
  assert.throws(
    () => parseRequest(ImageAnalysisRequest, { items: [{ id: 'a', label: 'x', images: [] }] }),
    invalid('items[0].images: at least one image is required'),
  )
  assert.throws(
    () => parseRequest(ImageAnalysisRequest, { items: [{ id: 'a', label: 'x' }] }),
    invalid('items[0].images: at least one image is required'),
  )
})

test('image mime types pair up per image or apply to all', () => {
  const [first, second] = [Buffer.from([1]), Buffer.from([2])]
  const paired = parseRequest(ImageAnalysisRequest, {
    items: [{ id: 'a', label: 'x', images: [first, second], mimeTypes: ['image/jpeg', ' IMAGE/WEBP '] }],
  })
  assert.deepEqual(paired.items[0].images, [
    { data: first, mimeType: 'image/jpeg' },
    { data: second, mimeType: 'image/webp' },
  ])

  const shared = parseRequest(ImageAnalysisRequest, {
    items: [{ id: 'a', label: 'x', images: [first, second], mimeTypes: ['image/gif'] }],
  })
  assert.deepEqual(
    shared.items[0].images.map((i) => i.mimeType),
    ['image/gif', 'image/gif'],
  )

  assert.throws(
    () =>
      parseRequest(ImageAnalysisRequest, {
        items: [{ id: 'a', label: 'x', images: [first, second], mimeTypes: ['image/png', 'image/png', 'image/png'] }],
      }),
    invalid('items[0].mimeTypes: expected 1 or 2 mime types, got 3'),
  )
})

test('audio items normalise the mime type', () => {
  const audio = Buffer.from([9])
  const parsed = parseRequest(AudioTranscriptionRequest, {
    items: [
      { id: 'a', label: 'x', audio, mimeType: ' Audio/WAV ' },
      { id: 'b', label: 'y', audio },
    ],
  })
  assert.deepEqual(
    parsed.items.map((i) => i.mimeType),
    ['audio/wav', 'audio/mp3'],
  )
})

test('hello defaults the name', () => {
  assert.deepEqual(parseRequest(HelloRequest, {}), { name: '' })
})
