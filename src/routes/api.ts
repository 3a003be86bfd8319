import { Router } from 'express';
import { VideoController, VideoControllerDeps } from '../controllers/videoController.js';
import { BotStatusSource, TelegramController } from '../controllers/telegramController.js';

export interface ApiRouterDeps extends VideoControllerDeps {
  /** Present only when the bot is configured */
  bot?: BotStatusSource;
}

export const createApiRouter = (deps: ApiRouterDeps): Router => {
  const router = Router();

  const videoController = new VideoController(deps);
  const telegramController = new TelegramController(deps.bot);

  // Video routes
  router.post('/video/info', (req, res, next) => videoController.getInfo(req, res, next));
  router.get('/video/download', (req, res, next) => videoController.download(req, res, next));
  router.get('/video/file/:id', (req, res, next) => videoController.getFile(req, res, next));
  router.get('/video/thumb', (req, res, next) => videoController.getThumbnail(req, res, next));

  // Telegram routes
  router.get('/telegram', (req, res) => telegramController.getStatus(req, res));

  return router;
};
