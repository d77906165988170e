import { loadConfig } from '../config/config';
import { createImageServices, ImageServices } from '../images';
import { describeError, ImageServiceError } from '../utils/errorHandler';

export interface ResolveImagesOptions {
  query: string;
  count: string;
  json?: boolean;
}

export interface CommandOutput {
  out(line: string): void;
  err(line: string): void;
}

const consoleOutput: CommandOutput = {
  out: line => console.log(line),
  err: line => console.error(line),
};

/**
 * Runs one resolution and returns the process exit code: 0 on success,
 * 1 for rejected input, 2 for anything else (config, startup, runtime).
 */
export async function resolveImagesCommand(
  options: ResolveImagesOptions,
  output: CommandOutput = consoleOutput
): Promise<number> {
  let services: ImageServices | undefined;

  try {
    services = await createImageServices(loadConfig());
    const images = await services.pipeline.resolve(options.query, Number(options.count));

    if (options.json) {
      output.out(JSON.stringify(images, null, 2));
    } else {
      for (const image of images) {
        output.out(`${image.url}  (${image.photographer || 'unknown'})`);
      }
    }
    return 0;
  } catch (error) {
    output.err(`Error: ${describeError(error)}`);
    return error instanceof ImageServiceError ? 1 : 2;
  } finally {
    await services?.close();
  }
}
