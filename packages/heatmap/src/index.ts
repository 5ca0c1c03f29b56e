#!/usr/bin/env node
import { createInterface } from 'readline/promises';
import { config } from './config.js';
import { logger } from './logger.js';
import { YahooChartAdapter } from './adapters/yahoo.js';
import { createColorScale } from './engines/color.js';
import { generateHeatmap } from './cli.js';
import { HeatmapError } from './errors.js';

// ══════════════════════════════════════════════════════════════
//  CLI Bootstrap
// ══════════════════════════════════════════════════════════════

async function promptSubject(): Promise<string> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        return await rl.question('Enter ticker symbol: ');
    } finally {
        rl.close();
    }
}

async function start(): Promise<void> {
    const subject = await promptSubject();

    const outputPath = await generateHeatmap({
        subject,
        source: new YahooChartAdapter(config.YAHOO_BASE_URL),
        saveDir: config.HEATMAP_SAVE_DIR,
        lookbackDays: config.HEATMAP_LOOKBACK_DAYS,
        options: {
            scale: createColorScale({ domainMin: config.HEATMAP_DOMAIN_MIN, domainMax: config.HEATMAP_DOMAIN_MAX }),
            columnCount: config.HEATMAP_COLUMN_COUNT,
            weekStart: config.HEATMAP_WEEK_START,
            weekdayCount: config.HEATMAP_WEEKDAY_COUNT,
            format: config.HEATMAP_FORMAT,
            density: config.HEATMAP_DENSITY,
        },
    });

    logger.info({ path: outputPath }, `Saved heatmap to ${outputPath}`);
}

// ── Start ───────────────────────────────────────
start().catch((err) => {
    if (err instanceof HeatmapError) {
        logger.error({ code: err.code }, err.message);
    } else {
        logger.fatal({ err }, 'Failed to render calendar heatmap');
    }
    process.exitCode = 1;
});
