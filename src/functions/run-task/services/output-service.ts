/**
 * Output service
 * Persists generated images and hands them to the platform's default viewer
 */

import { spawn } from 'child_process';
import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import { err, ok, Result } from '../../../common/types';
import { formatTimestamp, getErrorMessage, logInfo, OutputError } from '../../../common/utils';

export interface ImageViewer {
  /** Resolves once the viewer process has launched */
  open(filePath: string): Promise<void>;
}

export interface ViewerCommand {
  command: string;
  args: string[];
  /** cmd.exe parses its own command line; Node must not re-quote the arguments */
  windowsVerbatimArguments: boolean;
}

/**
 * The "open with default application" command for a platform
 */
export function viewerCommand(platform: NodeJS.Platform, filePath: string): ViewerCommand {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [filePath], windowsVerbatimArguments: false };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '""', `"${filePath}"`], windowsVerbatimArguments: true };
    default:
      return { command: 'xdg-open', args: [filePath], windowsVerbatimArguments: false };
  }
}

/**
 * Launches the platform opener detached so the run can exit immediately
 */
export class SystemImageViewer implements ImageViewer {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  open(filePath: string): Promise<void> {
    const { command, args, windowsVerbatimArguments } = viewerCommand(this.platform, filePath);

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { detached: true, stdio: 'ignore', windowsVerbatimArguments });
      child.once('error', reject);
      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    });
  }
}

const EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/webp': 'webp',
};

export class OutputService {
  constructor(
    private readonly outputDirectory: string,
    private readonly viewer: ImageViewer,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * File name for an image generated at `date`, e.g. generated-image-20261019080503.png
   */
  imageFileName(mimeHint: string, date: Date = this.now()): string {
    const extension = EXTENSIONS[mimeHint] ?? 'png';
    return `generated-image-${formatTimestamp(date)}.${extension}`;
  }

  /**
   * Writes image bytes to a timestamped file and returns its path
   */
  async saveImage(bytes: Uint8Array, mimeHint: string): Promise<Result<string, OutputError>> {
    const filePath = path.join(this.outputDirectory, this.imageFileName(mimeHint));

    try {
      await mkdir(this.outputDirectory, { recursive: true });
      await writeFile(filePath, bytes);
    } catch (error) {
      return err(new OutputError(`Could not write image file: ${filePath}`, { filePath, error: getErrorMessage(error) }));
    }

    logInfo('Saved generated image', { filePath, bytes: bytes.byteLength });
    return ok(filePath);
  }

  openImage(filePath: string): Promise<void> {
    return this.viewer.open(filePath);
  }
}
