"use strict"
import Ajv from 'ajv'
import readLogsRequestSchema from '../schemas/readLogsRequest.schema.json'
import {parseTimeWindow} from './parseTimeWindow'
import {
  type LogSession,
  type ReadLogsRequest,
  type S3LRConfig,
  LogReadError,
  defaultContent,
  defaultFolder,
  defaultStart,
  defaultWindow,
  getS3LRConfig,
  toContentProfile
} from './s3LogReader'

const validateReadLogsRequest = new Ajv({allErrors: true}).compile<ReadLogsRequest>(readLogsRequestSchema)

//Log keys carry a four digit year
const latestEndDateTime = Date.parse("9999-12-31T23:59:59.999Z")

const rfc3339Pattern = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i

export function parseDateTime (value: string): Date | undefined {
  if (!rfc3339Pattern.test(value)) return undefined
  const d = new Date(value)
  return isNaN(d.getTime()) ? undefined : d
}

/**
 * Resolves a read request, from the command line or a Lambda event, into a session for
 * `displayLog`. Missing values take the command line defaults: folder `root`, start
 * 2020-01-01T00:00:00Z, a one hour window and basic content.
 *
 * An explicit `end` takes precedence over `window`.
 */
export function newLogSession (request: unknown, config: S3LRConfig = getS3LRConfig()): LogSession {

  if (!validateReadLogsRequest(request))
  {
    const errs = (validateReadLogsRequest.errors ?? [])
      .map((e) => `${e.instancePath || "request"} ${e.message ?? "is invalid"}`)
      .join(", ")
    throw new LogReadError("request", `Invalid read request: ${errs}`)
  }

  const startStr = request.start ?? defaultStart
  const startDateTime = parseDateTime(startStr)
  if (!startDateTime) throw new LogReadError("request", `Invalid start date time: ${startStr}`)

  let endDateTime: Date
  if (request.end !== undefined)
  {
    const end = parseDateTime(request.end)
    if (!end) throw new LogReadError("request", `Invalid end date time: ${request.end}`)
    endDateTime = end
  }
  else
  {
    const windowStr = request.window ?? defaultWindow
    try
    {
      endDateTime = new Date(startDateTime.getTime() + parseTimeWindow(windowStr))
    } catch (e)
    {
      throw new LogReadError("request", `Invalid time window: ${e instanceof Error ? e.message : String(e)}`, e)
    }

    const end = endDateTime.getTime()
    if (isNaN(end) || end > latestEndDateTime)
    {
      throw new LogReadError("request", `Invalid time window: ${windowStr} ends after 9999-12-31T23:59:59Z`)
    }
  }

  if (endDateTime.getTime() < startDateTime.getTime())
  {
    throw new LogReadError("request", `End date time ${endDateTime.toISOString()} precedes start date time ${startDateTime.toISOString()}`)
  }

  return {
    region: request.region ?? config.region,
    logBucket: request.logBucket,
    folder: request.folder ?? defaultFolder,
    sourceBuckets: request.sourceBuckets ?? [],
    startDateTime,
    endDateTime,
    content: toContentProfile(request.content ?? defaultContent),
    config,
  }
}
