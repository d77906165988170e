import { Router, Response } from 'express';
import { z } from 'zod';
import { ImageResolver } from '../images/imageResolutionPipeline';
import { DestinationImageService } from '../images/destinationImages';
import { handleError, ImageServiceError } from '../utils/errorHandler';

export interface ImageRouteDeps {
  resolver: ImageResolver;
  destinations: DestinationImageService;
}

const MAX_COUNT = 30;

const resolveBody = z.object({
  query: z.string().trim().min(1, 'Query required'),
  count: z.number().int().min(1).max(MAX_COUNT).default(1),
});

const destinationBody = z.object({
  destination: z.string().trim().min(1, 'Destination required'),
});

const touristImagesBody = destinationBody.extend({
  spots: z.array(z.string()).max(MAX_COUNT),
});

function badRequest(res: Response, error: z.ZodError): void {
  res.status(400).json({ success: false, message: error.issues[0]?.message ?? 'Invalid request' });
}

function failure(res: Response, error: unknown, context: string): void {
  handleError(error, context);
  if (error instanceof ImageServiceError) {
    res.status(error.statusCode).json({ success: false, message: error.message });
    return;
  }
  res.status(500).json({ success: false, message: 'An error occurred' });
}

export function createImageRouter({ resolver, destinations }: ImageRouteDeps): Router {
  const router = Router();

  /**
   * POST /api/images/resolve
   */
  router.post('/images/resolve', async (req, res) => {
    const body = resolveBody.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);

    try {
      const images = await resolver.resolve(body.data.query, body.data.count);
      res.json({ success: true, images });
    } catch (error) {
      failure(res, error, 'POST /api/images/resolve');
    }
  });

  /**
   * POST /api/fetch-destination-image
   */
  router.post('/fetch-destination-image', async (req, res) => {
    const body = destinationBody.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);

    try {
      const image = await destinations.destinationImage(body.data.destination);
      if (image) {
        res.json({ success: true, image });
      } else {
        res.status(404).json({ success: false, message: 'No images found' });
      }
    } catch (error) {
      failure(res, error, 'POST /api/fetch-destination-image');
    }
  });

  router.post('/destinations/preview', async (req, res) => {
    const body = destinationBody.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);

    try {
      const urls = await destinations.previewImages(body.data.destination);
      res.json({ success: true, urls });
    } catch (error) {
      failure(res, error, 'POST /api/destinations/preview');
    }
  });

  router.post('/destinations/tourist-images', async (req, res) => {
    const body = touristImagesBody.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);

    try {
      const images = await destinations.touristSpotImages(body.data.destination, body.data.spots);
      res.json({ success: true, images });
    } catch (error) {
      failure(res, error, 'POST /api/destinations/tourist-images');
    }
  });

  return router;
}
