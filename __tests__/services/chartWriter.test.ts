import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { JsonChartWriter } from '../../services/chartWriter';
import type { ChartData } from '../../types';

let dir: string | undefined;

afterEach(async () => {
  if (dir) await rm(dir, { recursive: true, force: true });
  dir = undefined;
});

describe('JsonChartWriter', () => {
  it('writes the chart as JSON inside the output directory', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = await mkdtemp(path.join(os.tmpdir(), 'charts-'));
    const outputDir = path.join(dir, 'nested');
    const chart: ChartData = { type: 'pie', title: 'Share', labels: ['A', 'B'], datasets: [{ label: 'n', data: [1, 2] }] };

    const filePath = await new JsonChartWriter(outputDir).write(chart);

    expect(path.dirname(filePath)).toBe(outputDir);
    expect(path.basename(filePath)).toMatch(/^chart-[0-9a-f-]+\.json$/);
    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual(chart);
  });
});
