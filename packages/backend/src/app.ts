import express from 'express';
import cors from 'cors';
import routes from './routes';
import { errorHandler } from './middleware/errorHandler';
import { generalLimiter } from './middleware/rateLimiter';

const app = express();

// CORS: local development plus FRONTEND_URL
app.use(cors({
  origin: function(origin, callback) {
    // server-to-server requests carry no origin
    if (!origin) return callback(null, true);

    if (origin.startsWith('http://localhost:') || origin.startsWith('http://127.0.0.1:')) {
      return callback(null, origin);
    }

    if (process.env.FRONTEND_URL && origin === process.env.FRONTEND_URL) {
      return callback(null, origin);
    }

    console.log('CORS blocked:', origin);
    callback(new Error('Not allowed by CORS'));
  },
  credentials: true,
  methods: ['GET', 'POST', 'PATCH', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
}));
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

app.use('/api', generalLimiter, routes);

app.use(errorHandler);

export default app;
