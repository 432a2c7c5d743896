import { randomUUID } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ChartData } from '../types';

/**
 * Persists chart data where a renderer can pick it up and returns its path.
 */
export interface ChartWriter {
    write(chart: ChartData): Promise<string>;
}

export class JsonChartWriter implements ChartWriter {
    constructor(private readonly outputDir: string) {}

    async write(chart: ChartData): Promise<string> {
        await mkdir(this.outputDir, { recursive: true });
        const filePath = path.join(this.outputDir, `chart-${randomUUID()}.json`);
        await writeFile(filePath, JSON.stringify(chart, null, 2), 'utf8');
        console.log(`[Executor] Chart written to ${filePath}`);
        return filePath;
    }
}
