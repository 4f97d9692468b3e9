"use strict"
import https from 'https'
import {S3Client} from '@aws-sdk/client-s3'
import {NodeHttpHandler} from '@smithy/node-http-handler'
import {type LogSession, LogReadError, S3LR_Logging} from './s3LogReader'

const awsRegionPattern = /^[a-z]{2}(-[a-z]+)+-\d+$/

/**
 * Populates the session with its S3 client. A session that already holds a client
 * is returned unchanged, so activation can be called from every stage.
 */
export function activateSession (session: LogSession): S3Client {
  if (session.s3) return session.s3

  if (!awsRegionPattern.test(session.region))
  {
    S3LR_Logging("exception", "", `AWS Region can not be determined. Region given as: ${session.region}`)
    throw new LogReadError("session", `AWS Region can not be determined. Region given as: ${session.region}`)
  }

  let s3: S3Client
  try
  {
    s3 = new S3Client({
      region: session.region,
      requestHandler: new NodeHttpHandler({
        socketAcquisitionWarningTimeout: 5_000,
        requestTimeout: session.config.requestTimeout,
        httpsAgent: new https.Agent({
          keepAlive: true,
          maxSockets: 100
        })
      })
    })
  } catch (e)
  {
    S3LR_Logging("exception", "", `Exception - Creating S3 Client for Region ${session.region}: \n${e} `)
    throw new LogReadError("session", `Exception - Creating S3 Client for Region ${session.region}: ${e}`, e)
  }

  S3LR_Logging("info", "101", `S3 Client created for Region ${session.region}`)

  session.s3 = s3
  return s3
}
