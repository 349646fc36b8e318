import { readFile } from 'node:fs/promises'

import type {
  FailedPipelineOutcome,
  NotificationResult,
  NotificationService,
} from '@autobuild/core'
import nodemailer from 'nodemailer'
import type { SendMailOptions } from 'nodemailer'
import type { Logger } from 'pino'

import type { SmtpConfig } from '../config/types.js'

/**
 * Subject line of failure reports.
 */
export const FAILURE_SUBJECT = 'Automated build failed'

const BANNER = '---------------------------------------------------'

/**
 * Content of one failure email.
 */
export interface FailureReport {
  /** Sender address. */
  readonly sender: string
  /** Receiver address. */
  readonly receiver: string
  /** Step whose command failed. */
  readonly failedStep: FailedPipelineOutcome['step']
  /** Full run log content. */
  readonly logContent: string
}

/**
 * Minimal mail transport surface, satisfied by a nodemailer transporter.
 */
export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>
}

/**
 * Raised when a failure report cannot be composed or delivered.
 */
export class NotificationTransportError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'NotificationTransportError'
  }
}

/**
 * Removes every non-ASCII character.
 *
 * @param text Input text.
 * @returns ASCII-only text.
 */
export const stripNonAscii = (text: string): string => {
  return text.replace(/[^\x00-\x7F]/gu, '')
}

/**
 * Composes the failure email for a report.
 *
 * @param report Failure report.
 * @returns Message options for the mail transport.
 */
export const composeFailureEmail = (report: FailureReport): SendMailOptions => {
  const text = [
    '',
    '',
    'This message was generated by the automated build, because the build failed',
    `at the ${report.failedStep} step. Log file content is printed below.`,
    '',
    BANNER,
    '',
    stripNonAscii(report.logContent),
    BANNER,
    '',
    '',
  ].join('\n')

  return {
    from: report.sender,
    to: report.receiver,
    subject: FAILURE_SUBJECT,
    text,
  }
}

/**
 * Creates an authenticated SMTP transport. Port 465 uses implicit TLS, every
 * other port must upgrade with STARTTLS.
 *
 * @param smtp SMTP settings.
 * @returns Nodemailer transporter.
 */
export const createSmtpTransport = (smtp: SmtpConfig): MailTransport => {
  const implicitTls = smtp.port === 465

  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: implicitTls,
    requireTLS: !implicitTls,
    auth: {
      user: smtp.sender,
      pass: smtp.password,
    },
  })
}

/**
 * Options for the email notifier.
 */
export interface EmailNotifierOptions {
  /** Sender and receiver addressing. */
  readonly smtp: Pick<SmtpConfig, 'sender' | 'receiver'>
  /** Transport used to deliver messages. */
  readonly transport: MailTransport
  /** Run logger. */
  readonly logger: Logger
  /** Run log file whose content is sent. */
  readonly logFilePath: string
}

/**
 * Emails the run log when a pipeline run fails.
 */
export class EmailNotifier implements NotificationService {
  private readonly options: EmailNotifierOptions

  /**
   * Creates an email notifier.
   *
   * @param options Notifier options.
   */
  public constructor(options: EmailNotifierOptions) {
    this.options = options
  }

  /**
   * Sends the failure report. Every error is returned, never thrown.
   *
   * @param outcome Failed outcome of the current run.
   * @returns Delivery result.
   */
  public async notifyFailure(outcome: FailedPipelineOutcome): Promise<NotificationResult> {
    const { sender, receiver } = this.options.smtp

    try {
      const logContent = await readFile(this.options.logFilePath, 'utf8')
      const message = composeFailureEmail({
        sender,
        receiver,
        failedStep: outcome.step,
        logContent,
      })

      this.options.logger.info(`Sending email to: ${receiver} since automated build failed`)
      await this.options.transport.sendMail(message)
      this.options.logger.info(`Successfully sent email to: ${receiver}`)

      return { delivered: true }
    } catch (error: unknown) {
      return {
        delivered: false,
        error: new NotificationTransportError(`Unable to send email to ${receiver}`, {
          cause: error,
        }),
      }
    }
  }
}
