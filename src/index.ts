import { createServer } from 'http'
import { Server } from 'socket.io'
import mongoose from 'mongoose'
import { createApp } from './app.js'
import { loadEnvironment } from './config.js'
import { bearerToken } from './middleware/auth.js'
import { MongoUnitOfWorkManager } from './repositories/mongo/unit-of-work.js'
import { createServices } from './services/index.js'
import { SocketNotificationDispatcher } from './services/notification-dispatcher.js'
import { TokenVerifier } from './utils/jwt.js'
import { logger } from './utils/logger.js'
import { addUserSocket, removeUserSocket } from './utils/userSockets.js'

const config = loadEnvironment()

const httpServer = createServer()

const io = new Server(httpServer, {
  cors: {
    origin: config.corsOrigins,
    methods: ['GET', 'POST'],
    credentials: true
  },
  pingTimeout: 60000,
  pingInterval: 25000
})

const verifier = new TokenVerifier(config.auth, config.rolesClaim)
const services = createServices({
  uow: new MongoUnitOfWorkManager(mongoose.connection, config.mongoTransactions),
  dispatcher: new SocketNotificationDispatcher(io, logger),
  logger,
  matching: config.matching
})

const app = createApp({ services, verifier, logger, corsOrigins: config.corsOrigins })
httpServer.on('request', app)

// Sockets authenticate with the same bearer token as the REST API
io.use((socket, next) => {
  const raw: unknown = socket.handshake.auth.token ?? socket.handshake.headers.authorization
  const token = typeof raw === 'string' ? bearerToken(raw) ?? raw : null
  if (!token) {
    next(new Error('Please authenticate'))
    return
  }
  verifier.verify(token)
    .then((identity) => services.users.findOrCreateBySubject(identity))
    .then((user) => {
      socket.data.userId = user.id
      next()
    })
    .catch((err: unknown) => {
      logger.warn('Socket authentication failed', { error: err instanceof Error ? err.message : String(err) })
      next(new Error('Please authenticate'))
    })
})

io.on('connection', (socket) => {
  const userId: unknown = socket.data.userId
  if (typeof userId !== 'string') {
    socket.disconnect(true)
    return
  }
  addUserSocket(userId, socket.id)
  logger.debug('Socket connected', { userId, socketId: socket.id })

  socket.on('disconnect', () => {
    removeUserSocket(userId, socket.id)
    logger.debug('Socket disconnected', { userId, socketId: socket.id })
  })
})

// Start server
mongoose.connect(config.mongoUrl)
  .then(() => {
    httpServer.listen(config.port, () => logger.info(`Server running on port ${config.port}`))
  })
  .catch(err => {
    logger.error('MongoDB connection error', { error: err instanceof Error ? err.message : String(err) })
    process.exit(1)
  })
