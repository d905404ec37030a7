import http from 'http';
import { WebApp } from '../presentation/web/WebApp';
import { errorMessage, Logger } from '../infrastructure/logger/Logger';

/**
 * Creates the HTTP server used for local development and self-hosting.
 * On Vercel the same WebApp is served by api/index.ts instead.
 */
export function createWebServer(webApp: WebApp): http.Server {
  return http.createServer((req, res) => {
    webApp.handle(req, res).catch(error => {
      Logger.error('Failed to write response', { url: req.url, error: errorMessage(error) });
      res.destroy();
    });
  });
}

export function startWebServer(webApp: WebApp, port: number = 3000): http.Server {
  const server = createWebServer(webApp);
  server.listen(port, () => {
    Logger.info(`Daily Habits server running on port ${port}`);
  });
  return server;
}
