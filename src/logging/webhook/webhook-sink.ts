/**
 * Webhook alert sink with buffering and retry
 *
 * Posts each message as JSON `{ "text": ... }` to a chat or alerting
 * webhook. Failed messages are buffered and retried with exponential
 * backoff; the oldest message is dropped when the buffer is full.
 */

import type { TimerAPI } from '$types/common';
import type { HttpPoster, WebhookSink, WebhookSinkConfig } from '../types';

interface BufferedMessage {
  text: string;
  retries: number;
}

const MAX_RETRY_DELAY_MS = 60000;

/**
 * Build an HttpPoster on the global fetch API
 * @param timeoutMs - Abort the request after this many milliseconds
 */
export function createFetchPoster(timeoutMs: number): HttpPoster {
  return async function(url: string, body: string): Promise<boolean> {
    const controller = new AbortController();
    const timer = setTimeout(function() {
      controller.abort();
    }, timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: body,
        signal: controller.signal
      });
      return response.ok;
    } finally {
      clearTimeout(timer);
    }
  };
}

/**
 * Create a webhook sink
 *
 * @param post - HTTP poster (fetch-based at runtime, a mock in tests)
 * @param timerApi - Timer API for retry scheduling
 * @param config - Webhook sink configuration
 * @returns Webhook sink instance
 *
 * @example
 * ```typescript
 * const alerts = createWebhookSink(createFetchPoster(5000), createNodeTimerApi(), {
 *   url: process.env.HEATING_WEBHOOK_URL ?? null,
 *   bufferSize: 10,
 *   retryDelayMs: 1000,
 *   maxRetries: 5
 * });
 * ```
 */
export function createWebhookSink(
  post: HttpPoster,
  timerApi: TimerAPI,
  config: WebhookSinkConfig
): WebhookSink {
  const url = config.url;
  const buffer: BufferedMessage[] = [];
  let retryTimerActive = false;
  let currentRetryDelay = config.retryDelayMs;
  let inFlight: Promise<void> = Promise.resolve();

  /**
   * Deliver one message
   * Resolves true on success, false on any failure
   */
  function send(message: BufferedMessage): Promise<boolean> {
    if (url === null) {
      return Promise.resolve(false);
    }

    return post(url, JSON.stringify({ text: message.text })).then(
      function(ok) {
        if (!ok) {
          console.warn('Webhook send failed: receiver rejected message');
        }
        return ok;
      },
      function(err: unknown) {
        console.warn('Webhook send exception: ' + String(err));
        return false;
      }
    );
  }

  function track(delivery: Promise<void>): void {
    inFlight = inFlight.then(function() {
      return delivery;
    });
  }

  function scheduleRetry(): void {
    if (buffer.length === 0) {
      retryTimerActive = false;
      return;
    }
    retryTimerActive = true;
    timerApi.set(currentRetryDelay, false, processBuffer);
  }

  /**
   * Retry the oldest buffered message
   */
  function processBuffer(): void {
    if (buffer.length === 0) {
      retryTimerActive = false;
      currentRetryDelay = config.retryDelayMs;
      return;
    }

    const message = buffer[0];
    track(send(message).then(function(ok) {
      if (ok) {
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
        console.warn('Webhook message dropped after ' + config.maxRetries + ' retries');
        buffer.shift();
        currentRetryDelay = config.retryDelayMs;
      } else {
        currentRetryDelay = Math.min(currentRetryDelay * 2, MAX_RETRY_DELAY_MS);
      }
      scheduleRetry();
    }));
  }

  function initialize(callback: (success: boolean, message: string) => void): void {
    if (url === null) {
      callback(true, 'Webhook alerts disabled');
      return;
    }
    callback(true, 'Webhook alerts enabled');
  }

  /**
   * Write formatted message to the webhook
   * Sent immediately when possible, buffered for retry otherwise
   */
  function write(formattedMessage: string): void {
    if (url === null) {
      return;
    }

    const message: BufferedMessage = { text: formattedMessage, retries: 0 };

    track(send(message).then(function(ok) {
      if (ok) {
        return;
      }

      if (buffer.length >= config.bufferSize) {
        const dropped = buffer.shift();
        console.warn('Webhook buffer full, dropping oldest message: ' + (dropped ? dropped.text.substring(0, 50) : ''));
      }
      buffer.push(message);

      if (!retryTimerActive) {
        scheduleRetry();
      }
    }));
  }

  return {
    write: write,
    initialize: initialize,
    getBufferSize: function() {
      return buffer.length;
    },
    flush: function() {
      return inFlight;
    }
  };
}
