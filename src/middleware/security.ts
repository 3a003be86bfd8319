import cors from 'cors';
import helmet from 'helmet';

/**
 * Open CORS: the browser client may be served from any origin and needs to
 * read the download headers to name the saved file.
 */
export const corsMiddleware = cors({
  origin: '*',
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type'],
  exposedHeaders: ['Content-Disposition', 'Content-Length'],
});

export const securityMiddleware = [
  helmet({
    // JSON and media only; no HTML is served from here
    contentSecurityPolicy: false,
    // Proxied thumbnails and artifacts are loaded cross-origin by the client
    crossOriginResourcePolicy: { policy: 'cross-origin' },
    crossOriginEmbedderPolicy: false,
  }),
];
