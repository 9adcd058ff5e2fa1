export * from './modem-http-client.js';
