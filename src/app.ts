import Fastify, { type FastifyError } from 'fastify';
import { ZodError } from 'zod';
import { MemoryStore, type GalleryStore } from './store.js';
import { PgStore } from './services/pg-store.js';
import { loadConfig, type AppConfig } from './config.js';
import { AppError } from './errors.js';
import { createAuthService, type AuthService } from './services/auth.service.js';
import { createGalleryService, type GalleryService } from './services/gallery.service.js';
import { ImagesService } from './services/images.service.js';
import { createTagsService, type TagsService } from './services/tags.service.js';
import { CollectionsService } from './services/collections.service.js';
import { CreditsService } from './services/credits.service.js';
import { HttpImageGenerator, type ImageGenerator } from './services/image-generator.js';
import { GenerationProcessor, InMemoryQueue, type GenerationQueue } from './services/queue.js';
import { RedisQueueService } from './services/redis-queue.js';
import { createAuthHooks, registerAuthRoutes } from './middleware/auth.js';
import { registerGalleryRoutes } from './routes/gallery.routes.js';
import { registerImageRoutes } from './routes/images.routes.js';
import { registerTagRoutes } from './routes/tags.routes.js';
import { registerCollectionRoutes } from './routes/collections.routes.js';
import { registerCreditRoutes } from './routes/credits.routes.js';
import { registerGenerationRoutes } from './routes/generations.routes.js';

export interface AppServices {
  store: GalleryStore;
  auth: AuthService;
  gallery: GalleryService;
  images: ImagesService;
  tags: TagsService;
  collections: CollectionsService;
  credits: CreditsService;
  queue: GenerationQueue | null;
}

declare module 'fastify' {
  interface FastifyInstance {
    services: AppServices;
  }
}

export interface CreateAppOptions {
  config?: AppConfig;
  store?: GalleryStore;
  generator?: ImageGenerator;
  credits?: CreditsService;
}

async function createStore(config: AppConfig): Promise<GalleryStore> {
  // Use PgStore if DATABASE_URL is set, otherwise MemoryStore
  if (config.DATABASE_URL) {
    const pgStore = new PgStore(config.DATABASE_URL);
    await pgStore.initialize();
    console.log('[Store] Using PostgreSQL database');
    return pgStore;
  }

  console.log('[Store] Using in-memory store');
  return new MemoryStore();
}

async function createQueue(
  config: AppConfig,
  processor: GenerationProcessor | null
): Promise<GenerationQueue | null> {
  if (!processor) {
    console.log('[Queue] No image generator configured; generation is disabled');
    return null;
  }

  if (config.REDIS_HOST) {
    const queue = new RedisQueueService(processor, {
      host: config.REDIS_HOST,
      port: config.REDIS_PORT,
      password: config.REDIS_PASSWORD,
      concurrency: config.GENERATION_CONCURRENCY,
    });
    await queue.startWorkers();
    console.log('[Queue] Using Redis generation queue');
    return queue;
  }

  return new InMemoryQueue(processor, { concurrency: config.GENERATION_CONCURRENCY });
}

export async function createApp(options: CreateAppOptions = {}) {
  const config = options.config ?? loadConfig();
  const app = Fastify({
    logger: config.LOG_LEVEL === 'silent' ? false : { level: config.LOG_LEVEL },
  });

  const store = options.store ?? (await createStore(config));
  const auth = createAuthService({
    jwtSecret: config.JWT_SECRET,
    jwtExpiresIn: config.JWT_EXPIRES_IN,
    refreshExpiresIn: config.REFRESH_EXPIRES_IN,
    bcryptRounds: config.BCRYPT_ROUNDS,
    adminEmail: config.ADMIN_EMAIL,
    adminPassword: config.ADMIN_PASSWORD,
  });
  const credits = options.credits ?? new CreditsService(store);
  const images = new ImagesService(store);

  const generator =
    options.generator ??
    (config.GENERATOR_URL
      ? new HttpImageGenerator({ url: config.GENERATOR_URL, apiKey: config.GENERATOR_API_KEY })
      : undefined);
  const processor = generator ? new GenerationProcessor(generator, images, credits) : null;

  const services: AppServices = {
    store,
    auth,
    gallery: createGalleryService(store, { pageSize: config.GALLERY_PAGE_SIZE }),
    images,
    tags: createTagsService(store),
    collections: new CollectionsService(store),
    credits,
    queue: await createQueue(config, processor),
  };
  app.decorate('services', services);

  const hooks = createAuthHooks(auth);

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
        ...(error.details !== undefined ? { details: error.details } : {}),
      });
    }

    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'validation_failed',
        message: 'Invalid request',
        details: error.issues,
      });
    }

    const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    if (statusCode === 500) {
      request.log.error(error);
      return reply.status(500).send({ error: 'internal_error', message: 'Internal Server Error' });
    }
    return reply.status(statusCode).send({ error: 'bad_request', message: error.message });
  });

  app.addHook('onClose', async () => {
    await services.queue?.close();
    await store.close?.();
  });

  // Health check endpoint
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  await registerAuthRoutes(app, { authService: auth, credits, hooks, prefix: '/auth' });
  await registerGalleryRoutes(app, { service: services.gallery, hooks, prefix: '/gallery' });
  await registerImageRoutes(app, { service: images, hooks, prefix: '/images' });
  await registerTagRoutes(app, { service: services.tags, hooks });
  await registerCollectionRoutes(app, { service: services.collections, hooks, prefix: '/collections' });
  await registerCreditRoutes(app, { service: credits, authService: auth, hooks, prefix: '/credits' });
  await registerGenerationRoutes(app, { queue: services.queue, tags: services.tags, hooks, prefix: '/generations' });

  return app;
}
