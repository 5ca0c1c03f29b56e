import { toHex } from '../engines/color.js';
import type { CalendarCell, HeatmapLayout, Legend, Panel } from '../adapters/types.js';

// ══════════════════════════════════════════════════════════════
//  SVG Renderer — composite layout → standalone SVG document
// ══════════════════════════════════════════════════════════════

export interface PresentationConfig {
    fontFamily: string;
    figureTitleSize: number;
    panelTitleSize: number;
    cellFontSize: number;
    annotationFontSize: number;
    legendLabelSize: number;
    cellWidth: number;
    cellHeight: number;
    margin: number;
    headerHeight: number;
    panelGapX: number;
    panelGapY: number;
    panelTitleHeight: number;
    averageHeight: number;
    maxWeeks: number;           // vertical room reserved per panel
    borderColor: string;
    borderWidth: number;
    textColor: string;
    background: string;
    showColumnLabels: boolean;
    legendWidthRatio: number;   // fraction of figure width
    legendHeight: number;
    legendGap: number;
}

export const DEFAULT_PRESENTATION: PresentationConfig = {
    fontFamily: 'DejaVu Sans',
    figureTitleSize: 16,
    panelTitleSize: 12,
    cellFontSize: 7,
    annotationFontSize: 8,
    legendLabelSize: 10,
    cellWidth: 56,
    cellHeight: 40,
    margin: 30,
    headerHeight: 70,
    panelGapX: 36,
    panelGapY: 40,
    panelTitleHeight: 26,
    averageHeight: 34,
    maxWeeks: 6,
    borderColor: '#808080',
    borderWidth: 0.8,
    textColor: '#000000',
    background: '#ffffff',
    showColumnLabels: false,
    legendWidthRatio: 0.6,
    legendHeight: 16,
    legendGap: 30,
};

export interface HeatmapHeading {
    title: string;
    subtitle?: string;
}

export function escapeXml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

/** Multi-line text as stacked tspans, first line baseline at `y`. */
function textBlock(lines: string[], x: number, y: number, size: number, attrs = ''): string {
    const spans = lines
        .map((line, i) => `<tspan x="${x}" dy="${i === 0 ? 0 : '1.2em'}">${escapeXml(line)}</tspan>`)
        .join('');
    return `<text x="${x}" y="${y}" font-size="${size}" text-anchor="middle"${attrs}>${spans}</text>`;
}

function panelGeometry(p: PresentationConfig, columns: number) {
    const labelRow = p.showColumnLabels ? p.cellFontSize * 2 : 0;
    const width = columns * p.cellWidth;
    const height = p.panelTitleHeight + labelRow + p.maxWeeks * p.cellHeight + p.averageHeight;
    return { width, height, labelRow };
}

function renderCell(cell: CalendarCell, x: number, y: number, p: PresentationConfig): string {
    if (cell.kind === 'padding') return '';

    const rect =
        `<rect class="cell ${cell.kind}" x="${x}" y="${y}" width="${p.cellWidth}" height="${p.cellHeight}"` +
        ` fill="${toHex(cell.color)}" stroke="${p.borderColor}" stroke-width="${p.borderWidth}"/>`;
    if (cell.label === '') return rect;

    const label = textBlock(cell.label.split('\n'), x + p.cellWidth / 2, y + p.cellHeight * 0.4, p.cellFontSize);
    return rect + label;
}

function renderPanel(
    panel: Panel,
    x: number,
    y: number,
    columnLabels: readonly string[],
    p: PresentationConfig,
): string {
    const { width, labelRow } = panelGeometry(p, columnLabels.length);
    const parts: string[] = [`<g class="panel" data-index="${panel.index}">`];

    parts.push(
        textBlock([panel.title], x + width / 2, y + p.panelTitleSize, p.panelTitleSize, ' font-weight="bold"'),
    );

    const gridTop = y + p.panelTitleHeight + labelRow;
    if (p.showColumnLabels) {
        columnLabels.forEach((label, col) => {
            parts.push(textBlock([label], x + (col + 0.5) * p.cellWidth, gridTop - p.cellFontSize / 2, p.cellFontSize));
        });
    }

    panel.grid.weeks.forEach((week, row) => {
        week.forEach((cell, col) => {
            parts.push(renderCell(cell, x + col * p.cellWidth, gridTop + row * p.cellHeight, p));
        });
    });

    const averageTop = gridTop + panel.grid.weeks.length * p.cellHeight + p.annotationFontSize * 1.5;
    parts.push(
        textBlock(panel.averageLabel.split('\n'), x + width / 2, averageTop, p.annotationFontSize, ' class="average"'),
    );

    parts.push('</g>');
    return parts.join('');
}

function renderLegend(legend: Legend, figureWidth: number, y: number, p: PresentationConfig): string {
    const width = figureWidth * p.legendWidthRatio;
    const x = (figureWidth - width) / 2;

    const stops = legend.stops
        .map((s) => `<stop offset="${Number((s.position * 100).toFixed(4))}%" stop-color="${toHex(s.color)}"/>`)
        .join('');
    const ticks = legend.ticks
        .map((t) => {
            const tx = x + t.position * width;
            return (
                `<line x1="${tx}" y1="${y + p.legendHeight}" x2="${tx}" y2="${y + p.legendHeight + 4}" stroke="${p.textColor}"/>` +
                textBlock([String(t.value)], tx, y + p.legendHeight + 4 + p.annotationFontSize * 1.2, p.annotationFontSize)
            );
        })
        .join('');

    return (
        `<g class="legend">` +
        `<defs><linearGradient id="legend-scale" x1="0" y1="0" x2="1" y2="0">${stops}</linearGradient></defs>` +
        `<rect x="${x}" y="${y}" width="${width}" height="${p.legendHeight}" fill="url(#legend-scale)" stroke="${p.borderColor}" stroke-width="${p.borderWidth}"/>` +
        ticks +
        textBlock([legend.label], figureWidth / 2, y + p.legendHeight + 8 + p.annotationFontSize * 2.6, p.legendLabelSize) +
        `</g>`
    );
}

/**
 * Render the whole composite: heading, month panels at their slots,
 * shared legend underneath. Blank slots emit nothing.
 */
export function renderSvg(
    layout: HeatmapLayout,
    heading: HeatmapHeading,
    presentation: PresentationConfig = DEFAULT_PRESENTATION,
): string {
    const p = presentation;
    const panel = panelGeometry(p, layout.columnLabels.length);

    const width = p.margin * 2 + layout.columnCount * panel.width + (layout.columnCount - 1) * p.panelGapX;
    const panelsTop = p.margin + p.headerHeight;
    const panelsHeight = layout.rowCount * panel.height + Math.max(layout.rowCount - 1, 0) * p.panelGapY;
    const legendTop = panelsTop + panelsHeight + p.legendGap;
    const height = legendTop + p.legendHeight + p.legendLabelSize * 4 + p.margin;

    const parts: string[] = [
        `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}"` +
            ` font-family="${escapeXml(p.fontFamily)}" fill="${p.textColor}">`,
        `<rect x="0" y="0" width="${width}" height="${height}" fill="${p.background}"/>`,
        textBlock(
            heading.subtitle === undefined ? [heading.title] : [heading.title, heading.subtitle],
            width / 2,
            p.margin + p.figureTitleSize,
            p.figureTitleSize,
            ' font-weight="bold" class="heading"',
        ),
    ];

    for (const item of layout.panels) {
        const x = p.margin + item.column * (panel.width + p.panelGapX);
        const y = panelsTop + item.row * (panel.height + p.panelGapY);
        parts.push(renderPanel(item, x, y, layout.columnLabels, p));
    }

    parts.push(renderLegend(layout.legend, width, legendTop, p));
    parts.push('</svg>');
    return parts.join('\n');
}
