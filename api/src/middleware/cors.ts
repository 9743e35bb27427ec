/**
 * CORS middleware configuration
 */

import { cors } from 'hono/cors';

const DEFAULT_ORIGINS = ['http://localhost:8080', 'http://localhost:5173', 'http://127.0.0.1:8080'];

export const corsMiddleware = cors({
  origin: process.env.CORS_ORIGINS?.split(',').map((origin) => origin.trim()) ?? DEFAULT_ORIGINS,
  allowMethods: ['GET', 'POST', 'OPTIONS'],
  allowHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
  exposeHeaders: ['X-Request-Id'],
  maxAge: 86400,
  credentials: true,
});
