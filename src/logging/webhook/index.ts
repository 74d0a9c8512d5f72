export { createWebhookSink, createFetchPoster } from './webhook-sink';
