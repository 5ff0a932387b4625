/**
 * Slack webhook output sink with buffering and retry
 *
 * Sends log messages to Slack via an incoming webhook for remote monitoring.
 * Features:
 * - Webhook URL comes from the environment (SLACK_WEBHOOK_URL)
 * - Buffers failed messages for retry
 * - Exponential backoff retry (30s, 60s capped)
 * - Drops oldest messages when buffer full
 * - Slack outages never reach the control loop
 */

import type { TimerAPI } from '$types/common';
import { errorMessage } from '$types/errors';
import type { HttpPost, SlackSink, SlackSinkConfig } from '../types';

const MAX_RETRY_DELAY_MS = 60000;

/**
 * Message in the retry buffer
 */
interface BufferedMessage {
  text: string;
  retries: number;
}

/**
 * POST a JSON body with fetch
 *
 * @param url - Target URL
 * @param body - Serialized JSON body
 * @throws {Error} On a non-2xx response or network failure
 */
export async function postJson(url: string, body: string): Promise<void> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: body,
  });

  if (!response.ok) {
    throw new Error('HTTP ' + response.status + ': ' + response.statusText);
  }
}

/**
 * Create a Slack sink with buffering and retry
 *
 * Failed messages are buffered and retried with exponential backoff.
 *
 * @param timerApi - Timer API for retry scheduling
 * @param config - Slack sink configuration
 * @param post - HTTP transport (defaults to fetch)
 * @returns Slack sink instance
 *
 * @example
 * ```typescript
 * const slackSink = createSlackSink(createNodeTimer(), {
 *   enabled: true,
 *   webhookUrl: process.env.SLACK_WEBHOOK_URL ?? null,
 *   bufferSize: 10,
 *   retryDelayMs: 30000,
 *   maxRetries: 5
 * });
 *
 * slackSink.initialize(function(success, message) {
 *   console.log(message);
 * });
 * ```
 */
export function createSlackSink(
  timerApi: TimerAPI,
  config: SlackSinkConfig,
  post: HttpPost = postJson
): SlackSink {
  let webhookUrl: string | null = null;
  let initialized = false;
  const buffer: BufferedMessage[] = [];
  let retryTimerActive = false;
  let currentRetryDelay = config.retryDelayMs;

  /**
   * Send a message to Slack
   * @param message - Message to send
   * @returns Resolves true when delivered, false otherwise (never rejects)
   */
  function sendToSlack(message: BufferedMessage): Promise<boolean> {
    if (!webhookUrl) {
      return Promise.resolve(false);
    }

    return post(webhookUrl, JSON.stringify({ text: message.text })).then(
      function() {
        return true;
      },
      function(err: unknown) {
        console.warn('Slack send failed: ' + errorMessage(err));
        return false;
      }
    );
  }

  function scheduleRetry(): void {
    if (buffer.length > 0) {
      timerApi.set(currentRetryDelay, false, processBuffer);
    } else {
      retryTimerActive = false;
    }
  }

  /**
   * Process the retry buffer
   * Attempts to send the first message, schedules retry on failure
   */
  function processBuffer(): void {
    const message = buffer[0];
    if (message === undefined) {
      retryTimerActive = false;
      currentRetryDelay = config.retryDelayMs;
      return;
    }

    void sendToSlack(message).then(function(delivered) {
      if (delivered) {
        buffer.shift();
        currentRetryDelay = config.retryDelayMs;

        if (buffer.length > 0) {
          processBuffer();
        } else {
          retryTimerActive = false;
        }
        return;
      }

      message.retries++;
      if (message.retries >= config.maxRetries) {
        console.warn('Slack message dropped after ' + config.maxRetries + ' retries');
        buffer.shift();
        currentRetryDelay = config.retryDelayMs;
      } else {
        currentRetryDelay = Math.min(currentRetryDelay * 2, MAX_RETRY_DELAY_MS);
      }

      scheduleRetry();
    });
  }

  /**
   * Initialize the sink by checking the webhook URL
   * @param callback - Called with (success, message)
   */
  function initialize(callback: (success: boolean, message: string) => void): void {
    initialized = true;

    if (!config.enabled) {
      callback(true, 'Slack disabled');
      return;
    }

    webhookUrl = config.webhookUrl;
    if (webhookUrl) {
      callback(true, 'Slack webhook configured');
    } else {
      callback(false, 'Slack enabled but SLACK_WEBHOOK_URL is not set');
    }
  }

  /**
   * Write formatted message to Slack
   * Messages are sent immediately if possible, or buffered for retry
   * @param formattedMessage - Pre-formatted log message (already filtered by level)
   */
  function write(formattedMessage: string): void {
    if (!config.enabled || !webhookUrl) {
      return;
    }

    const message: BufferedMessage = {
      text: formattedMessage,
      retries: 0
    };

    void sendToSlack(message).then(function(delivered) {
      if (delivered) {
        return;
      }

      if (buffer.length >= config.bufferSize) {
        const dropped = buffer.shift();
        console.warn('Slack buffer full, dropping oldest message: ' + (dropped ? dropped.text.substring(0, 50) : ''));
      }
      buffer.push(message);

      if (!retryTimerActive) {
        retryTimerActive = true;
        timerApi.set(currentRetryDelay, false, processBuffer);
      }
    });
  }

  function isInitialized(): boolean {
    return initialized;
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  return {
    write: write,
    initialize: initialize,
    isInitialized: isInitialized,
    getBufferSize: getBufferSize
  };
}
