import {S3Client} from '@aws-sdk/client-s3'
import {getLogObjectData} from '../handlers/getLogObjectData'
import {LogReadError, S3LR_Logging} from '../handlers/s3LogReader'
import {installFakeLogBucket, testSession} from './fakeLogBucket'

jest.mock('../handlers/s3LogReader', () => ({
  ...jest.requireActual('../handlers/s3LogReader'),
  S3LR_Logging: jest.fn()
}))

describe('getLogObjectData', () => {
  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('should download the object body', async () => {
    const fake = installFakeLogBucket('log-bucket', {'root/2020-03-20-13-30-00-X1': 'line one\nline two\n'})

    const result = await getLogObjectData(testSession(), 'root/2020-03-20-13-30-00-X1')

    expect(Buffer.from(result).toString('utf8')).toBe('line one\nline two\n')
    expect(fake.getRequests).toEqual(['root/2020-03-20-13-30-00-X1'])
  })

  it('should report a missing log object', async () => {
    installFakeLogBucket('log-bucket', {})

    const result = getLogObjectData(testSession(), 'I-do-not-exist-2300-12-31')

    await expect(result).rejects.toThrow(LogReadError)
    await expect(result).rejects.toMatchObject({
      stage: 'download',
      message: 'Exception - Log Object Not Found (log-bucket/I-do-not-exist-2300-12-31): The specified key does not exist.',
    })
    expect(S3LR_Logging).toHaveBeenCalledWith('exception', '', expect.stringContaining('Log Object Not Found'))
  })

  it('should report any other download error', async () => {
    jest.spyOn(S3Client.prototype, 'send').mockImplementation(async () => {
      throw new Error('socket hang up')
    })

    await expect(getLogObjectData(testSession(), 'root/k')).rejects.toMatchObject({
      stage: 'download',
      message: 'Exception - Retrieving Log Object log-bucket/root/k: Error: socket hang up',
    })
  })
})
