import sharp from 'sharp';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { buildHeatmapLayout } from '../src/pipeline.js';
import { DEFAULT_PRESENTATION, escapeXml, renderSvg } from '../src/render/svg.js';
import { heatmapFileName, rasterize, saveHeatmap } from '../src/render/raster.js';

function count(haystack: string, needle: string): number {
    return haystack.split(needle).length - 1;
}

describe('renderSvg', () => {
    const layout = buildHeatmapLayout([{ date: '2024-01-01', value: 2.5 }]);
    const svg = renderSvg(layout, { title: 'A&B Daily Return Calendar Heatmap', subtitle: '(2024-01-01 to 2024-01-31)' });

    it('sizes the figure from the column count and one row of panels', () => {
        expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="1288" height="516"')).toBe(true);
    });

    it('draws value and no-data cells and skips padding', () => {
        expect(count(svg, '<rect class="cell value"')).toBe(1);
        expect(count(svg, '<rect class="cell no-data"')).toBe(22);
        expect(count(svg, '<rect class="cell padding"')).toBe(0);
        expect(svg).toContain('<rect class="cell value" x="30" y="126" width="56" height="40" fill="#5aba5a"');
    });

    it('writes the two-line cell label', () => {
        expect(svg).toContain('<tspan x="58" dy="0">1</tspan><tspan x="58" dy="1.2em">2.50%</tspan>');
    });

    it('annotates the panel with its title and average', () => {
        expect(count(svg, '<g class="panel"')).toBe(1);
        expect(svg).toContain('>January 2024</tspan>');
        expect(count(svg, '>Avg Daily Return:</tspan>')).toBe(1);
        expect(count(svg, '>2.50%</tspan>')).toBe(2);
    });

    it('renders exactly one legend with every stop', () => {
        expect(count(svg, '<g class="legend">')).toBe(1);
        expect(count(svg, '<stop ')).toBe(5);
        expect(svg).toContain('<stop offset="50%" stop-color="#ffffff"/>');
        expect(svg).toContain('>Daily Return %</tspan>');
    });

    it('escapes the heading', () => {
        expect(svg).toContain('>A&amp;B Daily Return Calendar Heatmap</tspan>');
        expect(escapeXml('<a href="x">\'')).toBe('&lt;a href=&quot;x&quot;&gt;&apos;');
    });

    it('adds weekday headers when asked', () => {
        const withLabels = renderSvg(layout, { title: 'T' }, { ...DEFAULT_PRESENTATION, showColumnLabels: true });
        expect(withLabels).toContain('>Mon</tspan>');
        expect(withLabels).toContain('>Fri</tspan>');
        expect(svg).not.toContain('>Mon</tspan>');
    });
});

describe('rasterize', () => {
    const square = '<svg xmlns="http://www.w3.org/2000/svg" width="4" height="4"><rect width="4" height="4" fill="#ff0000"/></svg>';

    it('encodes PNG at the requested density', async () => {
        const image = await rasterize(square, 'png', 72);
        const meta = await sharp(image.data).metadata();

        expect(meta.format).toBe('png');
        expect(meta.width).toBe(4);
        expect(meta.height).toBe(4);
    });

    it('encodes JPEG', async () => {
        const image = await rasterize(square, 'jpeg', 144);
        const meta = await sharp(image.data).metadata();

        expect(meta.format).toBe('jpeg');
        expect(meta.width).toBe(8);
    });

    it('passes SVG through', async () => {
        const image = await rasterize(square, 'svg');
        expect(image.data.toString('utf8')).toBe(square);
    });
});

describe('saveHeatmap', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'heatmap-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('names files after the subject and format', () => {
        expect(heatmapFileName('SPY', 'png')).toBe('SPY_calendar_heatmap.png');
        expect(heatmapFileName('BRK/B', 'jpeg')).toBe('BRK_B_calendar_heatmap.jpg');
    });

    it('creates the directory and writes the image', async () => {
        const target = join(dir, 'nested', 'out');
        const path = await saveHeatmap({ format: 'svg', data: Buffer.from('<svg/>') }, target, 'SPY');

        expect(path).toBe(join(target, 'SPY_calendar_heatmap.svg'));
        expect(await readFile(path, 'utf8')).toBe('<svg/>');
    });
});
