import axios from 'axios';
import fs from 'fs';
import path from 'path';
import { MediaFile, MediaKind, createMediaFile } from '../../domain/entities/MediaAsset';
import { NotFoundError } from '../../domain/errors';

/**
 * Local filesystem storage for generated and discovered media.
 */
export class LocalMediaStore {
    /**
     * Creates a directory and its parents if missing.
     */
    async ensureDirectory(dir: string): Promise<void> {
        await fs.promises.mkdir(dir, { recursive: true });
    }

    /**
     * Writes bytes to a file, creating parent directories and overwriting any existing file.
     */
    async writeFile(dest: string, data: Buffer): Promise<string> {
        await this.ensureDirectory(path.dirname(dest));
        await fs.promises.writeFile(dest, data);
        return dest;
    }

    /**
     * Saves a remote (http/https) or data URL to a file.
     */
    async saveFromUrl(url: string, dest: string): Promise<string> {
        if (url.startsWith('data:')) {
            const matches = url.match(/^data:([A-Za-z-+/]+);base64,(.+)$/);
            if (!matches) {
                throw new Error('Invalid data URL');
            }
            return this.writeFile(dest, Buffer.from(matches[2], 'base64'));
        }

        try {
            const response = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
            return await this.writeFile(dest, Buffer.from(response.data));
        } catch (error) {
            if (axios.isAxiosError(error)) {
                throw new Error(`Download failed for ${url}: ${error.message}`);
            }
            throw error;
        }
    }

    /**
     * Lists regular files in a directory whose name ends with the extension (case-sensitive).
     * Sub-directories and other extensions are ignored.
     */
    async listFiles(dir: string, extension: string, kind: MediaKind): Promise<MediaFile[]> {
        let entries: fs.Dirent[];
        try {
            entries = await fs.promises.readdir(dir, { withFileTypes: true });
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                throw new NotFoundError(`Media directory not found: ${dir}`);
            }
            throw error;
        }

        return entries
            .filter((entry) => entry.isFile() && path.extname(entry.name) === extension)
            .map((entry) => createMediaFile(path.join(dir, entry.name), kind));
    }
}

/**
 * Structural check: fs errors may come from another realm, where `instanceof Error` fails.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}
