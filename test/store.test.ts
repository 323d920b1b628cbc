import fs from 'fs'
import path from 'path'
import { createMetadataStore } from '../src/store'
import { UnsafeImageTagError } from '../src/errors'
import { makeTmpDir, readFile } from './fixtures'

describe('metadata store', () => {
   let dir: string

   beforeEach(() => {
      dir = makeTmpDir()
   })

   test('prepare creates the output directory with its parents', async () => {
      const outputDir = path.join(dir, 'Data', 'metadata')
      await createMetadataStore(outputDir).prepare()
      expect(fs.statSync(outputDir).isDirectory()).toBe(true)
   })

   test('pathFor appends the metadata suffix', () => {
      const store = createMetadataStore(dir)
      expect(store.pathFor('foo-1')).toBe(path.join(dir, 'foo-1_metadata.json'))
      expect(store.pathFor('foo/bar-1')).toBe(
         path.join(dir, 'foo', 'bar-1_metadata.json')
      )
   })

   test('pathFor rejects tags that leave the output directory', () => {
      const store = createMetadataStore(dir)
      expect(() => store.pathFor('../escape')).toThrow(UnsafeImageTagError)
      expect(() => store.pathFor('/etc/passwd')).toThrow(UnsafeImageTagError)
   })

   test('pathFor accepts a tag that merely starts with two dots', () => {
      const store = createMetadataStore(dir)
      expect(store.pathFor('..hidden')).toBe(
         path.join(dir, '..hidden_metadata.json')
      )
   })

   test('write overwrites the previous output', async () => {
      const store = createMetadataStore(dir)
      await store.write('foo-1', 'first attempt output')
      const file = await store.write('foo-1', 'second')
      expect(file).toBe(path.join(dir, 'foo-1_metadata.json'))
      expect(readFile(file)).toBe('second')
      expect(fs.readdirSync(dir)).toEqual(['foo-1_metadata.json'])
   })

   test('write creates nested directories for slashed tags', async () => {
      const store = createMetadataStore(path.join(dir, 'out'))
      const file = await store.write('foo/bar-1', '{}')
      expect(file).toBe(path.join(dir, 'out', 'foo', 'bar-1_metadata.json'))
      expect(readFile(file)).toBe('{}')
   })
})
