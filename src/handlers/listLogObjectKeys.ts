"use strict"
import {
  ListObjectsV2Command,
  type ListObjectsV2CommandInput,
  type ListObjectsV2CommandOutput
} from '@aws-sdk/client-s3'
import {activateSession} from './activateSession'
import {type LogSession, LogReadError, S3LR_Logging, formatKeyTimestamp} from './s3LogReader'

/**
 * Lists the log object keys under the session folder whose timestamp falls within
 * the session window, oldest first.
 *
 * Log object keys are `folder/YYYY-MM-DD-HH-MM-SS-<suffix>`, so listing starts after
 * the formatted start time and stops at the first key that sorts after the formatted
 * end time. A key sorting equal to the end stamp is still inside the window.
 *
 * Pages are requested only as the consumer pulls keys; once a key beyond the window
 * is seen no further page is requested.
 */
export async function* listLogObjectKeys (session: LogSession): AsyncGenerator<string, void, undefined> {
  const s3 = activateSession(session)

  const prefix = `${session.folder}/`
  const startAfter = prefix + formatKeyTimestamp(session.startDateTime)
  const endAfter = prefix + formatKeyTimestamp(session.endDateTime)

  const listReq: ListObjectsV2CommandInput = {
    Bucket: session.logBucket,
    Prefix: prefix,
    StartAfter: startAfter,
    MaxKeys: session.config.maxListKeys,
  }

  let isTruncated = true
  let pages = 0

  while (isTruncated)
  {
    let page: ListObjectsV2CommandOutput
    try
    {
      page = await s3.send(new ListObjectsV2Command(listReq))
    } catch (e)
    {
      S3LR_Logging("exception", "", `Exception - Listing Log Objects from ${session.logBucket}/${prefix} after ${startAfter}: \n${e} `)
      throw new LogReadError("list", `Exception - Listing Log Objects from ${session.logBucket}/${prefix} after ${startAfter}: ${e}`, e)
    }

    pages++
    S3LR_Logging("info", "201", `List page ${pages} for ${session.logBucket}/${prefix} returned ${page.Contents?.length ?? 0} keys`)

    for (const obj of page.Contents ?? [])
    {
      const key = obj.Key

      //Some stores list the folder itself as an object
      if (key === undefined || key === session.folder || key === prefix) continue

      if (key > endAfter)
      {
        S3LR_Logging("info", "202", `Reached end of window at ${key}`)
        return
      }

      yield key
    }

    isTruncated = page.IsTruncated === true && page.NextContinuationToken !== undefined
    listReq.ContinuationToken = page.NextContinuationToken
  }
}
