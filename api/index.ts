import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadConfig } from '../src/infrastructure/config/env';
import { AppContainer, createContainer } from '../src/container';

// Reused across invocations of a warm serverless instance
let container: AppContainer | null = null;

function getContainer(): AppContainer {
  if (!container) {
    container = createContainer(loadConfig());
  }
  return container;
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  await getContainer().webApp.handle(req, res);
}
