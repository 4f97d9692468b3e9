"use strict"
import {type GetObjectCommandInput, GetObjectCommand, NoSuchKey} from '@aws-sdk/client-s3'
import {activateSession} from './activateSession'
import {type LogSession, LogReadError, S3LR_Logging} from './s3LogReader'

export async function getLogObjectData (session: LogSession, s3Key: string): Promise<Uint8Array> {
  const s3 = activateSession(session)

  const getObjectCmd: GetObjectCommandInput = {
    Bucket: session.logBucket,
    Key: s3Key,
  }

  let data: Uint8Array
  try
  {
    const getS3Result = await s3.send(new GetObjectCommand(getObjectCmd))
    data = await getS3Result.Body?.transformToByteArray() ?? new Uint8Array()
  } catch (e)
  {
    if (e instanceof NoSuchKey)
    {
      S3LR_Logging("exception", "", `Exception - Log Object Not Found (${session.logBucket}/${s3Key}) \n${e}`)
      throw new LogReadError("download", `Exception - Log Object Not Found (${session.logBucket}/${s3Key}): ${e.message}`, e)
    }

    S3LR_Logging("exception", "", `Exception - Retrieving Log Object ${session.logBucket}/${s3Key} \n${e}`)
    throw new LogReadError("download", `Exception - Retrieving Log Object ${session.logBucket}/${s3Key}: ${e}`, e)
  }

  S3LR_Logging("info", "301", `Log Object Pulled (${data.length} bytes): ${s3Key}`)
  return data
}
