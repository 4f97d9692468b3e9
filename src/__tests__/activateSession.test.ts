import {S3Client} from '@aws-sdk/client-s3'
import {activateSession} from '../handlers/activateSession'
import {LogReadError} from '../handlers/s3LogReader'
import {testSession} from './fakeLogBucket'

jest.mock('../handlers/s3LogReader', () => ({
  ...jest.requireActual('../handlers/s3LogReader'),
  S3LR_Logging: jest.fn()
}))

describe('activateSession', () => {

  it('should populate the session with an S3 client', async () => {
    const session = testSession({region: 'eu-central-1'})

    const s3 = activateSession(session)

    expect(s3).toBeInstanceOf(S3Client)
    expect(session.s3).toBe(s3)
    expect(await s3.config.region()).toBe('eu-central-1')
  })

  it('should return the same client when activated twice', () => {
    const session = testSession()

    const first = activateSession(session)
    const second = activateSession(session)

    expect(second).toBe(first)
    expect(session.s3).toBe(first)
  })

  it('should keep a client the session already holds', () => {
    const existing = new S3Client({region: 'us-west-2'})
    const session = testSession({s3: existing})

    expect(activateSession(session)).toBe(existing)
  })

  it('should fail without creating a client when the region is invalid', () => {
    const session = testSession({region: 'this-should-fail'})

    expect(() => activateSession(session)).toThrow(LogReadError)
    expect(() => activateSession(session)).toThrow('AWS Region can not be determined. Region given as: this-should-fail')
    expect(session.s3).toBeUndefined()
  })
})
