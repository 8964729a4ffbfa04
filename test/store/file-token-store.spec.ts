import { expect } from 'chai'
import sinon from 'sinon'
import fs from 'node:fs'
import path from 'path'
import { FileTokenStore } from '../../src/store'

describe('FileTokenStore', () => {
  const testFilePath = path.join(__dirname, 'test-tokens', 'token.json')
  const now = 1_700_000_000_000
  let clock: sinon.SinonFakeTimers

  beforeEach(() => {
    clock = sinon.useFakeTimers({ now, toFake: ['Date'] })
  })

  afterEach(() => {
    clock.restore()
    if (fs.existsSync(testFilePath)) {
      fs.unlinkSync(testFilePath)
    }
    if (fs.existsSync(path.dirname(testFilePath))) {
      fs.rmdirSync(path.dirname(testFilePath))
    }
  })

  describe('constructor', () => {
    it('should create non-existent directories', () => {
      new FileTokenStore(testFilePath)
      expect(fs.existsSync(path.dirname(testFilePath))).to.be.true
    })

    it('should throw error for empty file path', () => {
      expect(() => new FileTokenStore('')).to.throw('Unknown file for read/write token')
    })

    it('should load entries from an existing file', () => {
      fs.mkdirSync(path.dirname(testFilePath), { recursive: true })
      fs.writeFileSync(
        testFilePath,
        JSON.stringify({ 'twitch:access_token': { value: 'existing_token', expiresAt: now + 120_000 } })
      )

      const store = new FileTokenStore(testFilePath)
      expect(store.get('twitch:access_token')).to.equal('existing_token')
      expect(store.getTtl('twitch:access_token')).to.equal(120)
    })

    it('should not return entries that expired while persisted', () => {
      fs.mkdirSync(path.dirname(testFilePath), { recursive: true })
      fs.writeFileSync(
        testFilePath,
        JSON.stringify({ 'twitch:access_token': { value: 'old_token', expiresAt: now - 1 } })
      )

      const store = new FileTokenStore(testFilePath)
      expect(store.get('twitch:access_token')).to.be.undefined
    })

    it('should throw error for corrupted JSON file', () => {
      fs.mkdirSync(path.dirname(testFilePath), { recursive: true })
      fs.writeFileSync(testFilePath, 'invalid json')
      expect(() => new FileTokenStore(testFilePath)).to.throw('Could not parse token file')
    })

    it('should throw error for a file in another format', () => {
      fs.mkdirSync(path.dirname(testFilePath), { recursive: true })
      fs.writeFileSync(testFilePath, JSON.stringify({ accessToken: 'token', expiresIn: 3600 }))
      expect(() => new FileTokenStore(testFilePath)).to.throw('Could not parse token file')
    })
  })

  describe('set', () => {
    it('should persist entries to the file', async () => {
      const store = new FileTokenStore(testFilePath)
      await store.set('twitch:access_token', 'new_token', 3600)

      const saved = JSON.parse(fs.readFileSync(testFilePath, { encoding: 'utf-8' }))
      expect(saved).to.deep.equal({
        'twitch:access_token': { value: 'new_token', expiresAt: now + 3_600_000 }
      })
    })

    it('should make entries visible to a new store on the same file', async () => {
      await new FileTokenStore(testFilePath).set('twitch:access_token', 'shared_token', 60)

      const reopened = new FileTokenStore(testFilePath)
      expect(reopened.get('twitch:access_token')).to.equal('shared_token')
    })
  })
})
