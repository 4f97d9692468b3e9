"use strict"
import type {Writable} from 'stream'
import yargs from 'yargs'
import {displayLog} from './displayLog'
import {newLogSession} from './newLogSession'
import {
  type LogSession,
  type S3LRConfig,
  LogReadError,
  S3LR_Logging,
  defaultStart,
  defaultWindow,
  getS3LRConfig
} from './s3LogReader'

export const rootUsage = `S3LogReader is a CLI utility for reading web access logs stored in S3.

Typically, the logs read are those generated in response to access to static web assets
themselves served directly from S3.

Usage:
  s3logreader <command> [flags]

Available Commands:
  read        Display S3 hosted web logs for a given time window

Use "s3logreader read --help" for more information about the read command.
`

export const readUsage = `Given a start date and time, together with a time window, displays the
S3 hosted web logs from a specified bucket for that time window.

Usage:
  s3logreader read <bucket> [flags]

Flags:
      --region string          the aws region to target (default from S3LogReaderRegion or AWS_REGION, else us-east-1)
      --path string            the path of the log data within the S3 bucket (default "root")
      --start string           start date time in 2020-01-02T15:04:05+07:00 form with time zone offset (default "${defaultStart}")
      --window string          time window in days (d), hours (h), minutes (m) or seconds (s),
                               for example '90s' for 90 seconds or '36h' for 36 hours (default "${defaultWindow}")
      --content string         basic, requestid, bucket, rich or raw (default "basic")
      --source-bucket string   only show entries served from this bucket; may be repeated (ignored for raw content)
  -h, --help                   help for read
`

//Usage text and exit codes are our own, yargs only parses
function parseReadArgs (args: string[]) {
  return yargs(args)
    .parserConfiguration({"parse-positional-numbers": false})
    .options({
      region: {type: "string"},
      path: {type: "string"},
      start: {type: "string"},
      window: {type: "string"},
      content: {type: "string"},
      "source-bucket": {type: "string", array: true},
    })
    .help(false)
    .version(false)
    .strictOptions()
    .exitProcess(false)
    .fail((msg: string, err: Error | undefined) => {
      throw new LogReadError("request", err?.message ?? msg, err)
    })
    .parseSync()
}

/**
 * Parses the arguments that follow `read` into a session. Returns undefined when help
 * was asked for.
 */
export function parseReadCommand (args: string[], config: S3LRConfig): LogSession | undefined {

  if (args.includes("--help") || args.includes("-h")) return undefined

  const argv = parseReadArgs(args)

  const positionals = argv._.map(String)

  //There must be exactly one S3 bucket name
  if (positionals.length === 0) throw new LogReadError("request", "An S3 bucket name must be provided")
  if (positionals.length > 1) throw new LogReadError("request", "Only expected a single bucket name argument")

  return newLogSession({
    region: argv.region,
    logBucket: positionals[0],
    folder: argv.path,
    sourceBuckets: argv["source-bucket"],
    start: argv.start,
    window: argv.window,
    content: argv.content,
  }, config)
}

/**
 * Command line entry point. Writes rendered logs to `stdout`, usage and errors to
 * `stderr`, and resolves to the process exit code.
 */
export async function runS3LogReader (
  args: string[],
  stdout: Writable = process.stdout,
  stderr: Writable = process.stderr,
  config?: S3LRConfig
): Promise<number> {

  const [command, ...rest] = args

  if (command === undefined)
  {
    stderr.write(`subcommand is required\n\n${rootUsage}`)
    return 1
  }

  if (command === "help" || command === "--help" || command === "-h")
  {
    stdout.write(rootUsage)
    return 0
  }

  if (command !== "read")
  {
    stderr.write(`unknown command "${command}" for "s3logreader"\n\n${rootUsage}`)
    return 1
  }

  try
  {
    const session = parseReadCommand(rest, config ?? getS3LRConfig())
    if (!session)
    {
      stdout.write(readUsage)
      return 0
    }

    S3LR_Logging("info", "601", `Reading logs from ${session.logBucket}/${session.folder} with start=${session.startDateTime.toISOString()}, end=${session.endDateTime.toISOString()}, content=${session.content}`)

    await displayLog(session, stdout)
    return 0
  } catch (e)
  {
    stderr.write(`${e instanceof Error ? e.message : String(e)}\n`)
    return 1
  }
}
