import cors from 'cors';
import dotenv from 'dotenv';
import express from 'express';
import helmet from 'helmet';

// Load environment variables before any other imports
dotenv.config();

import createListeningRouter from './backend/routes/listening';
import { DailyStatsCache } from './backend/services/dailyStatsCache';
import { LastFmService } from './backend/services/lastfmService';
import { ListeningTimeService } from './backend/services/listeningTimeService';
import { TrackDurationCache } from './backend/services/trackDurationCache';
import { TrackDurationService } from './backend/services/trackDurationService';
import { WeeklyStatsService } from './backend/services/weeklyStatsService';
import { loadConfig } from './backend/utils/config';
import { FileStorage } from './backend/utils/fileStorage';
import { createLogger } from './backend/utils/logger';

const config = loadConfig();
const logger = createLogger('Server');
const app = express();

// Initialize file storage and caches
const fileStorage = new FileStorage(config.dataDir);
const durationCache = new TrackDurationCache(
  fileStorage,
  config.durationCacheFile
);
const dailyCache = new DailyStatsCache(fileStorage, config.dailyCacheFile);

// Security middleware
app.use(helmet());

// CORS configuration with strict origin allowlist
app.use(
  cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (curl, server-to-server) in development only
      if (!origin && process.env.NODE_ENV !== 'production') {
        return callback(null, true);
      }

      const allowedOrigins = [
        'http://localhost:8080',
        'http://127.0.0.1:8080',
        config.frontendUrl,
      ].filter(Boolean);

      if (origin && allowedOrigins.includes(origin)) {
        return callback(null, true);
      }

      logger.warn(`CORS request rejected from origin: ${origin || 'null'}`);
      return callback(new Error('Not allowed by CORS'));
    },
  })
);

app.use(express.json());

app.get('/health', (req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// Initialize services
const lastfmService = new LastFmService(config.lastfm);
const durationService = new TrackDurationService(lastfmService, durationCache);
const listeningTimeService = new ListeningTimeService(
  lastfmService,
  durationService,
  dailyCache
);
const weeklyStatsService = new WeeklyStatsService(
  listeningTimeService,
  dailyCache
);

// API routes
app.use(
  '/api/v1/listening',
  createListeningRouter(
    listeningTimeService,
    weeklyStatsService,
    durationCache,
    dailyCache,
    config.defaultItemsPerPage
  )
);

app.get('/api/v1', (req, res) => {
  res.json({
    message: 'Last.fm Listening Time API',
    version: '1.0.0',
    endpoints: {
      daily: '/api/v1/listening/daily',
      weekly: '/api/v1/listening/weekly',
      cache: '/api/v1/listening/cache',
    },
  });
});

// Error handling middleware
app.use(
  (
    err: unknown,
    req: express.Request,
    res: express.Response,
    _next: express.NextFunction
  ) => {
    logger.error('Unhandled error', err);
    res.status(500).json({
      success: false,
      error:
        process.env.NODE_ENV === 'production' || !(err instanceof Error)
          ? 'Internal server error'
          : err.message,
    });
  }
);

// 404 handler
app.use((req, res) => {
  res.status(404).json({ success: false, error: 'Route not found' });
});

async function startServer(): Promise<void> {
  try {
    await fileStorage.ensureDataDir();
    await durationCache.load();
    await dailyCache.load();
    logger.info('Caches loaded');

    if (!config.lastfm.apiKey) {
      logger.warn('LASTFM_API_KEY is not set, Last.fm requests will fail');
    }

    // Only start server if not in test environment
    if (process.env.NODE_ENV !== 'test') {
      const server = app.listen(config.port, config.host, () => {
        logger.info(`Server running on ${config.host}:${config.port}`);
        logger.info(
          `Health check: http://${config.host}:${config.port}/health`
        );
      });

      server.on('error', error => {
        logger.error('Server error', error);
      });
    }
  } catch (error) {
    logger.error('Failed to start server', error);
    process.exit(1);
  }
}

void startServer();

export default app;
