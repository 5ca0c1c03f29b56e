import sharp from 'sharp';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';

// ══════════════════════════════════════════════════════════════
//  Raster Output — SVG → png/jpeg/webp, written to disk
// ══════════════════════════════════════════════════════════════

export type ImageFormat = 'png' | 'jpeg' | 'webp' | 'svg';

export interface RenderedImage {
    format: ImageFormat;
    data: Buffer;
}

const EXTENSIONS: Record<ImageFormat, string> = {
    png: 'png',
    jpeg: 'jpg',
    webp: 'webp',
    svg: 'svg',
};

/**
 * Rasterize an SVG document. `density` is the DPI sharp uses to
 * scale the vector input (72 = 1:1). `svg` passes the document through.
 */
export async function rasterize(svg: string, format: ImageFormat, density = 300): Promise<RenderedImage> {
    const source = Buffer.from(svg, 'utf8');
    if (format === 'svg') return { format, data: source };

    const data = await sharp(source, { density }).toFormat(format).toBuffer();
    return { format, data };
}

export function heatmapFileName(subject: string, format: ImageFormat): string {
    const safe = subject.replace(/[\\/:*?"<>|\s]+/g, '_');
    return `${safe}_calendar_heatmap.${EXTENSIONS[format]}`;
}

export async function saveHeatmap(image: RenderedImage, directory: string, subject: string): Promise<string> {
    await mkdir(directory, { recursive: true });
    const outputPath = join(directory, heatmapFileName(subject, image.format));
    await writeFile(outputPath, image.data);
    return outputPath;
}
