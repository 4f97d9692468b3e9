"use strict"
import {type ContentProfile, type LogSession, LogReadError, S3LR_Logging} from './s3LogReader'

//S3 server access log fields, split on single spaces:
//  0 owner, 1 bucket, 2-3 [time zone], 4 remote ip, 5 requester, 6 request id, 7 operation, 8 key,
//  9.. "request-uri" status error bytes size total-time turnaround "referer" "user-agent",
//  then 7 trailing fields: version id, host id, signature, cipher, auth type, host header, tls.
//The user agent holds a variable number of spaces, so the middle block is located by counting
//from both ends of the line and never split further.
const leadingFieldCount = 9
const trailingFieldCount = 7
const minimumFieldCount = leadingFieldCount + 1 + trailingFieldCount

const bucketField = 1
const requestIdField = 6


export function sourceBucketOf (line: string): string | undefined {
  return line.split(" ")[bucketField]
}

export function renderLogLine (line: string, content: ContentProfile): string {
  if (content === "raw") return line

  const parts = line.split(" ")
  const count = parts.length

  if (count < minimumFieldCount)
  {
    S3LR_Logging("warn", "401", `Log line has ${count} fields, expected at least ${minimumFieldCount}; passed through unchanged: ${line}`)
    return line
  }

  const middle = parts.slice(leadingFieldCount, count - trailingFieldCount).join(" ")

  switch (content)
  {
    case "basic":
      return [...parts.slice(2, 5), middle].join(" ")
    case "requestid":
      return [...parts.slice(2, 5), parts[requestIdField], middle].join(" ")
    case "bucket":
      return [...parts.slice(1, 5), middle].join(" ")
    case "rich":
      return [...parts.slice(1, 5), ...parts.slice(requestIdField, leadingFieldCount), middle].join(" ")
    default: {
      const unsupported: never = content
      throw new LogReadError("render", `No implementation for content type: ${String(unsupported)}`)
    }
  }
}

/**
 * Splits a downloaded log object into lines and renders those that pass the session's
 * source bucket filter, in their original order. Raw content is not split or filtered;
 * it is written out as stored.
 */
export function renderLogLines (session: LogSession, data: Uint8Array): string[] {
  const lines = Buffer.from(data).toString("utf8").split("\n")
  const rendered: string[] = []

  for (const line of lines)
  {
    if (line.length === 0) continue

    if (session.sourceBuckets.length > 0)
    {
      const bucket = sourceBucketOf(line)
      if (bucket === undefined || !session.sourceBuckets.includes(bucket)) continue
    }

    rendered.push(renderLogLine(line, session.content))
  }

  return rendered
}
