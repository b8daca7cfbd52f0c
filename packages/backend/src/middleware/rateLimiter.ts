import rateLimit from 'express-rate-limit';

const isDev = process.env.NODE_ENV !== 'production';

export const generalLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: isDev ? 1000 : 500,
  message: {
    success: false,
    error: {
      code: 'RATE_LIMIT_EXCEEDED',
      message: 'Too many requests. Try again in 15 minutes.',
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
});

export const uploadLimiter = rateLimit({
  windowMs: 60 * 60 * 1000,
  max: isDev ? 500 : 200,
  message: {
    success: false,
    error: {
      code: 'UPLOAD_LIMIT_EXCEEDED',
      message: 'Upload limit exceeded. Try again in an hour.',
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
});

export const runLimiter = rateLimit({
  windowMs: 60 * 60 * 1000,
  max: isDev ? 500 : 120,
  message: {
    success: false,
    error: {
      code: 'RUN_LIMIT_EXCEEDED',
      message: 'Extraction run limit exceeded. Try again in an hour.',
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
});
