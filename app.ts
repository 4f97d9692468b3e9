import {Writable} from 'stream'
import type {Context, Handler} from 'aws-lambda'
import {displayLog} from './src/handlers/displayLog'
import {newLogSession} from './src/handlers/newLogSession'
import {LogReadError, S3LR_Logging, getS3LRConfig} from './src/handlers/s3LogReader'

export interface ReadLogsResult {
  statusCode: number
  body: string
}

//Lambda entry point: the event is a read request, the rendered log is returned as the body
export async function readLogsHandler (event: unknown, context: Context): Promise<ReadLogsResult> {
  S3LR_Logging("info", "701", `Event: ${JSON.stringify(event)} \nRequest Id: ${context.awsRequestId}`)

  const chunks: string[] = []
  const sink = new Writable({
    write (chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf8"))
      callback()
    }
  })

  try
  {
    const session = newLogSession(event, getS3LRConfig())
    await displayLog(session, sink)
  } catch (e)
  {
    const badRequest = e instanceof LogReadError && (e.stage === "request" || e.stage === "render")
    return {
      statusCode: badRequest ? 400 : 500,
      body: e instanceof Error ? e.message : String(e)
    }
  }

  return {
    statusCode: 200,
    body: chunks.join("")
  }
}

export const s3LogReaderHandler: Handler<unknown, ReadLogsResult> = readLogsHandler

export default s3LogReaderHandler
