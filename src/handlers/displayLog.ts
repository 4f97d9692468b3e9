"use strict"
import {once} from 'events'
import {Readable, Writable} from 'stream'
import {pipeline} from 'stream/promises'
import {transform} from 'stream-transform'
import {activateSession} from './activateSession'
import {listLogObjectKeys} from './listLogObjectKeys'
import {getLogObjectData} from './getLogObjectData'
import {renderLogLines} from './renderLogLines'
import {type LogSession, S3LR_Logging} from './s3LogReader'


//Returns false once the sink asks for the writer to wait for a drain
function writeLogData (session: LogSession, data: Uint8Array, sink: Writable) {

  //S3 web log objects end with a newline, raw content goes out exactly as stored
  if (session.content === "raw") return sink.write(data)

  let ready = true
  for (const line of renderLogLines(session, data))
  {
    if (!sink.write(`${line}\n`)) ready = false
  }
  return ready
}

/**
 * Writes the web logs from the session's bucket and folder, between its start and end
 * times, to the sink.
 *
 * Keys are listed, downloaded and rendered by three stages joined by buffers of
 * `queueCapacity` entries. The first error raised by any stage stops the pipeline,
 * tears down the other stages and is thrown to the caller.
 */
export async function displayLog (session: LogSession, sink: Writable = process.stdout): Promise<void> {

  //Fail before any stage starts if there is no usable S3 client
  activateSession(session)

  const capacity = session.config.queueCapacity

  const keys = Readable.from(listLogObjectKeys(session), {
    objectMode: true,
    highWaterMark: capacity,
  })

  //One download at a time keeps buffers in key order
  const fetcher = transform({
    parallel: 1,
    objectMode: true,
    highWaterMark: capacity,
  }, (s3Key: string, callback: (err?: Error | null, data?: Uint8Array) => void) => {
    getLogObjectData(session, s3Key)
      .then((data) => callback(null, data), (e: Error) => callback(e))
  })

  const display = new Writable({
    objectMode: true,
    highWaterMark: capacity,
    write (data: Uint8Array, _encoding, callback) {
      let ready: boolean
      try
      {
        ready = writeLogData(session, data, sink)
      } catch (e)
      {
        callback(e instanceof Error ? e : new Error(String(e)))
        return
      }

      if (ready) callback()
      else once(sink, "drain").then(() => callback(), (e: Error) => callback(e))
    },
  })

  try
  {
    await pipeline(keys, fetcher, display)
  } catch (e)
  {
    S3LR_Logging("exception", "", `Exception - Reading Logs from ${session.logBucket}/${session.folder}: \n${e} `)
    throw e
  }

  S3LR_Logging("info", "501", `Completed Reading Logs from ${session.logBucket}/${session.folder}`)
}
