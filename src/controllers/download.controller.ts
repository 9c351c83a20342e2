import { Request, Response, NextFunction } from 'express';
import { DownloadService } from '../services/download.service';

export const DOWNLOAD_MESSAGE =
  'Direct your client to this URL to download the file. In production, stream the file from secure storage.';

export const createDownloadController = (downloads: DownloadService) => ({
  // Resolve a download token (no auth required; the token is the credential)
  downloadFile: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { product, file_url } = await downloads.resolve(req.params.token);

      if (req.query.redirect === 'true') {
        return res.redirect(file_url);
      }

      res.json({
        success: true,
        data: {
          product,
          file_url,
          message: DOWNLOAD_MESSAGE,
        },
      });
    } catch (error) {
      next(error);
    }
  },
});
