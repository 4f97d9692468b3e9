"use strict"

/*
| description : S3LogReader - Read and render S3 web access logs for a time window
| Shared types, configuration and logging for the read pipeline
+---------------------------------------------------------------------------- */

import type {S3Client} from '@aws-sdk/client-s3'
import {version} from '../../package.json'


export const contentProfiles = ["basic", "requestid", "bucket", "rich", "raw"] as const

export type ContentProfile = typeof contentProfiles[number]

export type LogReadStage = "session" | "list" | "download" | "render" | "request"

export type LogLevel = "info" | "warn" | "error" | "debug" | "exception"

export interface S3LRConfig {
  region: string
  maxListKeys: number
  requestTimeout: number
  queueCapacity: number
}

//The unresolved parameter bundle, as received from the command line or a Lambda event
export interface ReadLogsRequest {
  region?: string
  logBucket: string
  folder?: string
  sourceBuckets?: string[]
  start?: string
  window?: string
  end?: string
  content?: string
}

export interface LogSession {
  region: string
  logBucket: string
  folder: string
  sourceBuckets: string[]
  startDateTime: Date
  endDateTime: Date
  content: ContentProfile
  config: S3LRConfig
  s3?: S3Client       //Populated by activateSession
}

export class LogReadError extends Error {
  readonly stage: LogReadStage

  constructor (stage: LogReadStage, message: string, cause?: unknown) {
    super(message, {cause})
    this.name = "LogReadError"
    this.stage = stage
  }
}


export const defaultFolder = "root"
export const defaultStart = "2020-01-01T00:00:00+00:00"
export const defaultWindow = "1h"
export const defaultContent: ContentProfile = "basic"


export function toContentProfile (value: string): ContentProfile {
  const profile = contentProfiles.find((p) => p === value)
  if (profile === undefined)
    throw new LogReadError("render", `No implementation for content type: ${value}`)
  return profile
}

/**
 * Formats a time as the UTC `YYYY-MM-DD-HH-MM-SS` stamp that S3 server access log
 * object keys begin with.
 */
export function formatKeyTimestamp (d: Date) {
  return d.toISOString().slice(0, 19).replace(/[T:]/g, "-")
}


function readIntSetting (env: NodeJS.ProcessEnv, name: string, fallback: number, min: number, max: number) {
  const v = env[name]
  if (v === undefined || v === "") return fallback

  const n = Number(v)
  if (!Number.isInteger(n) || n < min || n > max)
  {
    throw new Error(`S3LogReader Config - Invalid definition: ${name} (${v}).`)
  }
  return n
}

export function getS3LRConfig (env: NodeJS.ProcessEnv = process.env): S3LRConfig {

  let region = "us-east-1"
  if (env.S3LogReaderRegion && env.S3LogReaderRegion.length > 0) region = env.S3LogReaderRegion
  else if (env.AWS_REGION && env.AWS_REGION !== "undefined" && env.AWS_REGION.length > 0) region = env.AWS_REGION

  return {
    region,
    maxListKeys: readIntSetting(env, "S3LogReaderMaxListKeys", 100, 1, 1000),    //ListObjectsV2 returns at most 1000
    requestTimeout: readIntSetting(env, "S3LogReaderRequestTimeout", 3_000, 1, 600_000),
    queueCapacity: readIntSetting(env, "S3LogReaderQueueCapacity", 5, 1, 1000),
  }
}


export function S3LR_Logging (level: LogLevel, index: string, msg: string) {

  const logLevel = process.env.S3LogReaderLogLevel?.toLowerCase() ?? "normal"
  const selectiveDebug = process.env.S3LogReaderSelectiveLogging ?? ""

  const li = `_${index},`

  if ((selectiveDebug.indexOf(li) > -1 || index === "" || logLevel === "all") && logLevel !== "none")
  {
    const tag = logLevel === "all" ? `(LOG ALL-${index})` : index

    if (level === "info") console.info(`S3LRLog-Info ${tag}: ${msg} \nVersion: ${version} - Selective Logging: ${selectiveDebug}`)
    if (level === "warn") console.warn(`S3LRLog-Warning ${tag}: ${msg} \nVersion: ${version} - Selective Logging: ${selectiveDebug}`)
    if (level === "error") console.error(`S3LRLog-Error ${tag}: ${msg} \nVersion: ${version} - Selective Logging: ${selectiveDebug}`)
    if (level === "debug") console.debug(`S3LRLog-Debug ${tag}: ${msg} \nVersion: ${version} - Selective Logging: ${selectiveDebug}`)
  }

  if (level === "exception") console.error(`S3LRLog-Exception ${index}: ${msg} \nVersion: ${version} - Selective Logging: ${selectiveDebug}`)
}
