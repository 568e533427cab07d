import { expect } from 'chai'
import { createSnapshot, DynamicConfig } from '../src/config/dynamic-config'
import {
  AuthorizationError,
  ExportNotCallableError,
  ExportNotFoundError,
  GuestTrapError,
  ProtocolError,
  SignatureMismatchError
} from '../src/errors'
import { EntryGate, EntryFunctionSource } from '../src/wasm/entry-gate'
import { InstanceCache } from '../src/wasm/instance-cache'
import { rejectionOf } from './helpers/rejection'
import { MemoryFiles, StubEngine, VERSION_PTR } from './helpers/stub-engine'

const EVERY_EXPORT = ['version', 'noop', 'add', 'wide', 'trap', 'bad_utf8', 'missing', 'counter']

describe('EntryGate', () => {
  let files: MemoryFiles
  let engine: StubEngine
  let cache: InstanceCache

  beforeEach(() => {
    files = new MemoryFiles()
    files.set('a.mod', 'v1')
    engine = new StubEngine()
    cache = new InstanceCache({ engine, readFile: files.readFile })
  })

  function gate(entryFunctions: Record<string, string[]>, instancePolicy?: 'fresh' | 'reuse'): EntryGate {
    const config = new DynamicConfig('hostlink-test.json', createSnapshot(entryFunctions))
    return new EntryGate(cache, config, { instancePolicy })
  }

  describe('authorization', () => {
    it('rejects functions missing from the permitted list without loading the module', async () => {
      const error = await rejectionOf(gate({ 'a.mod': ['foo'] }).callEntry('a.mod', 'bar'))

      expect(error).to.be.instanceOf(AuthorizationError)
      expect(error).to.have.property(
        'message',
        `Function 'bar' is not configured as an entry function for guest module 'a.mod'. Allowed functions: ["foo"]`
      )
      expect(error).to.have.deep.property('allowed', ['foo'])
      expect(engine.compiles).to.equal(0)
    })

    it('rejects every function of an unlisted module', async () => {
      const error = await rejectionOf(gate({}).callEntry('a.mod', 'version'))
      expect(error).to.be.instanceOf(AuthorizationError)
      expect(error).to.have.deep.property('allowed', [])
    })

    it('follows changes of the permitted list', async () => {
      const permitted: Record<string, string[]> = { 'a.mod': [] }
      const source: EntryFunctionSource = {
        getEntryFunctionsForFile: (modulePath) => [...(permitted[modulePath] ?? [])]
      }
      const entryGate = new EntryGate(cache, source)

      expect(await rejectionOf(entryGate.callEntry('a.mod', 'noop'))).to.be.instanceOf(AuthorizationError)
      permitted['a.mod'] = ['noop']
      expect(await entryGate.callEntry('a.mod', 'noop')).to.deep.equal({ kind: 'void' })
    })
  })

  describe('calling', () => {
    it('reads the string returned by a () -> i32 export', async () => {
      const result = await gate({ 'a.mod': EVERY_EXPORT }).callEntry('a.mod', 'version')
      expect(result).to.deep.equal({ kind: 'string', pointer: VERSION_PTR, value: 'v1' })
    })

    it('calls a () -> () export', async () => {
      expect(await gate({ 'a.mod': EVERY_EXPORT }).callEntry('a.mod', 'noop')).to.deep.equal({ kind: 'void' })
    })

    it('reports a missing export', async () => {
      const error = await rejectionOf(gate({ 'a.mod': EVERY_EXPORT }).callEntry('a.mod', 'missing'))
      expect(error).to.be.instanceOf(ExportNotFoundError)
      expect(error).to.have.property('message', "Export 'missing' not found in guest module 'a.mod'")
    })

    it('reports an export that is not a function', async () => {
      const error = await rejectionOf(gate({ 'a.mod': EVERY_EXPORT }).callEntry('a.mod', 'counter'))
      expect(error).to.be.instanceOf(ExportNotCallableError)
      expect(error).to.have.property('message', "Export 'counter' in guest module 'a.mod' is a global, not a function")
    })

    it('rejects exports with parameters', async () => {
      const error = await rejectionOf(gate({ 'a.mod': EVERY_EXPORT }).callEntry('a.mod', 'add'))
      expect(error).to.be.instanceOf(SignatureMismatchError)
      expect(error).to.have.property('signature', '(i32, i32) -> i32')
    })

    it('rejects exports with other result types', async () => {
      const error = await rejectionOf(gate({ 'a.mod': EVERY_EXPORT }).callEntry('a.mod', 'wide'))
      expect(error).to.be.instanceOf(SignatureMismatchError)
      expect(error).to.have.property('signature', '() -> i64')
    })

    it('reports a trap as GuestTrapError', async () => {
      const error = await rejectionOf(gate({ 'a.mod': EVERY_EXPORT }).callEntry('a.mod', 'trap'))
      expect(error).to.be.instanceOf(GuestTrapError)
      expect(error).to.have.property('message', "Guest function 'trap' in 'a.mod' failed: unreachable")
    })

    it('reports a returned string that is not UTF-8', async () => {
      const error = await rejectionOf(gate({ 'a.mod': EVERY_EXPORT }).callEntry('a.mod', 'bad_utf8'))
      expect(error).to.be.instanceOf(ProtocolError)
      expect(error).to.have.property('message', "String returned by 'bad_utf8' is not valid UTF-8")
    })
  })

  describe('instance policy', () => {
    it('uses a fresh instance per call by default, compiling once', async () => {
      const entryGate = gate({ 'a.mod': EVERY_EXPORT })
      expect(entryGate.instancePolicy).to.equal('fresh')

      await entryGate.callEntry('a.mod', 'noop')
      await entryGate.callEntry('a.mod', 'noop')

      expect(engine.instantiations).to.equal(2)
      expect(engine.compiles).to.equal(1)
    })

    it('sees the latest file contents under the fresh policy', async () => {
      const entryGate = gate({ 'a.mod': EVERY_EXPORT })
      await entryGate.callEntry('a.mod', 'version')
      files.set('a.mod', 'v2')

      expect(await entryGate.callEntry('a.mod', 'version')).to.deep.equal({
        kind: 'string',
        pointer: VERSION_PTR,
        value: 'v2'
      })
    })

    it('keeps calling the cached instance under the reuse policy', async () => {
      const entryGate = gate({ 'a.mod': EVERY_EXPORT }, 'reuse')
      await entryGate.callEntry('a.mod', 'version')
      files.set('a.mod', 'v2')
      const result = await entryGate.callEntry('a.mod', 'version')

      expect(result).to.deep.equal({ kind: 'string', pointer: VERSION_PTR, value: 'v1' })
      expect(engine.instantiations).to.equal(1)
    })
  })
})
