import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createRoutes } from './routes';
import { createLibraryContext, LibraryContext } from './context';
import { allowedOrigins } from './config/environment';
import { swaggerSpec } from './swagger/swagger.config';
import { logger } from './config/logger';

const docsPage = `
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Library Catalog API Docs</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui.css">
  <style>
    body { margin: 0; padding: 0; }
    .swagger-ui .topbar { display: none; }
  </style>
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui-bundle.js"></script>
  <script>
    window.onload = function() {
      SwaggerUIBundle({
        url: '/openapi.json',
        dom_id: '#swagger-ui',
        deepLinking: true,
        displayRequestDuration: true,
        tryItOutEnabled: true
      });
    };
  </script>
</body>
</html>`;

/**
 * Creates and configures the Express application around a library context
 */
export function createApp(context: LibraryContext = createLibraryContext()): Application {
  const app = express();

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Swagger UI loads its bundle from a CDN
  }));

  app.use(cors({ origin: allowedOrigins() }));

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use(requestLogger);

  // API Documentation - Swagger UI
  app.get('/docs', (_req, res) => {
    res.type('html').send(docsPage);
  });

  // OpenAPI JSON endpoint
  app.get('/openapi.json', (_req, res) => {
    res.status(200).json(swaggerSpec);
  });

  // Mount API routes
  app.use('/', createRoutes(context));

  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  logger.debug('Express application configured', { library: context.directory.name });

  return app;
}
