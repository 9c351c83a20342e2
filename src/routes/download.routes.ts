import { Router } from 'express';
import { createDownloadController } from '../controllers/download.controller';
import { DownloadService } from '../services/download.service';

export const createDownloadRoutes = (downloads: DownloadService): Router => {
  const router = Router();
  const downloadController = createDownloadController(downloads);

  // Download file (uses token, no auth required)
  router.get('/:token', downloadController.downloadFile);

  return router;
};
