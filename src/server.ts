import * as dotenv from 'dotenv';
// 1. Load Environment Variables FIRST
dotenv.config();

import express from 'express';
import mongoose from 'mongoose';
import { ServerApiVersion } from 'mongodb';
import cors, { CorsOptions } from 'cors';
import { createServer } from 'http';
import { Server, Socket } from 'socket.io';

// Import routers
import menuDayRouter from './routes/menuDayRoutes';
import orderRouter from './routes/orderRoutes';

// Import error handling
import AppError from './utils/AppError';
import { globalErrorHandler } from './utils/errorHandler';
import { kitchenRoom } from './utils/websocketHelper';

// 2. Validate Required Environment Variables
const requiredEnvVars = ['MONGO_URI', 'JWT_SECRET'];

const missingEnvVars = requiredEnvVars.filter((varName) => !process.env[varName]);

if (missingEnvVars.length > 0) {
  console.error('❌ CRITICAL ERROR: Missing required environment variables:');
  missingEnvVars.forEach((varName) => {
    console.error(`   - ${varName}`);
  });
  console.error('\nPlease set these variables in your .env file before starting the server.');
  process.exit(1);
}

// Warn about optional but recommended variables
const recommendedEnvVars = ['NODE_ENV', 'PORT', 'ALLOWED_ORIGINS'];
const missingRecommended = recommendedEnvVars.filter((varName) => !process.env[varName]);

if (missingRecommended.length > 0 && process.env.NODE_ENV !== 'test') {
  console.warn('⚠️  WARNING: Missing recommended environment variables (using defaults):');
  missingRecommended.forEach((varName) => {
    console.warn(`   - ${varName}`);
  });
}

const MONGO_URI = process.env.MONGO_URI ?? '';
const PORT = Number(process.env.PORT) || 3001;

// 3. Database Connection Setup
const connectDB = async () => {
  try {
    await mongoose.connect(MONGO_URI, {
      serverApi: {
        version: ServerApiVersion.v1,
        strict: true,
        deprecationErrors: true,
      },
    });

    console.log('✅ MongoDB connection successful with Stable API.');
  } catch (error) {
    console.error('❌ MongoDB connection failed:', error);
    process.exit(1);
  }
};

// 4. Express App Setup
const app = express();
const httpServer = createServer(app);

// CORS Configuration
const allowedOrigins = process.env.ALLOWED_ORIGINS
  ? process.env.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim())
  : ['http://localhost:3000', 'http://localhost:5173'];

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Allow requests with no origin (like mobile apps or curl requests)
    if (!origin) return callback(null, true);

    if (allowedOrigins.includes(origin)) {
      callback(null, true);
    } else {
      console.warn(`Blocked CORS request from origin: ${origin}`);
      callback(new Error('Not allowed by CORS'));
    }
  },
  credentials: true,
};

export const io = new Server(httpServer, {
  cors: {
    origin: allowedOrigins,
    methods: ['GET', 'POST'],
    credentials: true,
  },
});

io.on('connection', (socket: Socket) => {
  console.log('A client connected:', socket.id);

  // Kitchen screens follow one cook's orders
  socket.on('join_kitchen', (cookId: unknown) => {
    if (typeof cookId === 'string' && cookId) {
      void socket.join(kitchenRoom(cookId));
      console.log(`Socket ${socket.id} joined kitchen room: ${kitchenRoom(cookId)}`);
    }
  });

  socket.on('disconnect', () => {
    console.log('Client disconnected:', socket.id);
  });
});

// Make io accessible in controllers via req.app.get('io')
app.set('io', io);

// Middleware
app.use(cors(corsOptions));
app.use(express.json());

// --- REQUEST LOGGER ---
app.use((req, res, next) => {
  if (process.env.NODE_ENV !== 'test') {
    console.log(`[LunchMate API] Incoming Request: ${req.method} ${req.originalUrl}`);
  }
  next();
});

// 5. API Routes
app.use('/api/v1/menu-days', menuDayRouter);
app.use('/api/v1/orders', orderRouter);

// Basic Health Check Route
app.get('/api/health', (req, res) => {
  res.status(200).json({ status: 'API is running', environment: process.env.NODE_ENV });
});

// 6. UNHANDLED ROUTE HANDLER
app.all('*', (req, res, next) => {
  next(new AppError(`Can't find ${req.originalUrl} on this server!`, 404));
});

// 7. GLOBAL ERROR HANDLER
app.use(globalErrorHandler);

// 8. Start Server
const startServer = async () => {
  await connectDB();

  httpServer.listen(PORT, () => {
    console.log(`🚀 Server is running on port ${PORT}`);
    console.log(`📊 Environment: ${process.env.NODE_ENV || 'development'}`);
  });
};

if (require.main === module) {
  startServer().catch((error: unknown) => {
    console.error('❌ Server failed to start:', error);
    process.exit(1);
  });
}

export { app, httpServer };
