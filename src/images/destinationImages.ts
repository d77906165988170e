import { ImageResolver } from './imageResolutionPipeline';
import { ResolvedImage } from './types';

export const PLACEHOLDER_IMAGE: ResolvedImage = {
  url: 'https://images.unsplash.com/photo-1476514525535-07fb3b4ae5f1?auto=format&q=80&w=1200',
  photographer: '',
  photographer_url: '',
};

export const PREVIEW_IMAGE_COUNT = 4;

/**
 * The query shapes used by the dashboard and itinerary views.
 */
export class DestinationImageService {
  constructor(private readonly resolver: ImageResolver, private readonly previewRegion: string = '') {}

  /** Dashboard strip for the next planned trip. */
  async previewImages(destination: string): Promise<string[]> {
    const query = this.previewRegion ? `${destination} ${this.previewRegion}` : destination;
    const images = await this.resolver.resolve(query, PREVIEW_IMAGE_COUNT);
    return images.map(image => image.url);
  }

  /** Hero image on the accommodation view. */
  async landmarkImage(destination: string): Promise<ResolvedImage | null> {
    const [image] = await this.resolver.resolve(`${destination} city landmark`, 1);
    return image ?? null;
  }

  /**
   * One image per tourist spot, resolved one after another so the search
   * API sees a single request at a time.
   */
  async touristSpotImages(destination: string, spotNames: string[]): Promise<ResolvedImage[]> {
    const images: ResolvedImage[] = [];
    for (const spotName of spotNames) {
      const name = spotName.trim() || 'landmark';
      const [image] = await this.resolver.resolve(`${name} ${destination}`, 1);
      images.push(image ?? PLACEHOLDER_IMAGE);
    }
    return images;
  }

  async destinationImage(destination: string): Promise<ResolvedImage | null> {
    const [image] = await this.resolver.resolve(`${destination} landmark tourist attraction`, 1);
    return image ?? null;
  }
}
