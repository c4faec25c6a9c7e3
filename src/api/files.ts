/**
 * Download routes.
 *
 * GET /files            List stored artifacts
 * GET /files/:filename  Download one artifact by filename or id
 */

import { Router } from 'express';
import { apiError, fileNotFoundError, pathTraversalError } from '../domain/errors';
import { ArtifactStore } from '../storage/store';
import { isSafeBasename } from '../storage/disk-store';

export function createFileRoutes(store: ArtifactStore): Router {
  const router = Router();

  /**
   * GET /files
   * List live artifacts, oldest first.
   */
  router.get('/', async (_req, res, next) => {
    try {
      const artifacts = await store.list();
      res.json({
        files: artifacts.map((artifact) => ({
          id: artifact.id,
          filename: artifact.filename,
          document_type: artifact.documentType,
          size_bytes: artifact.sizeBytes,
          created_at: artifact.createdAt,
          expires_at: artifact.expiresAt,
        })),
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /files/:filename
   * Stream the stored bytes. The segment may be a filename or an artifact id.
   */
  router.get('/:filename', async (req, res, next) => {
    const { filename } = req.params;

    if (!isSafeBasename(filename)) {
      res.status(400).json(apiError(pathTraversalError(filename)));
      return;
    }

    try {
      const artifact = (await store.getByFilename(filename)) ?? (await store.get(filename));
      if (!artifact) {
        res.status(404).json(apiError(fileNotFoundError(filename)));
        return;
      }

      res.status(200);
      res.set({
        'Content-Type': artifact.contentType,
        'Content-Length': String(artifact.sizeBytes),
        'Content-Disposition': `attachment; filename="${artifact.filename}"`,
        'Cache-Control': 'no-store',
      });
      res.end(artifact.content);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
