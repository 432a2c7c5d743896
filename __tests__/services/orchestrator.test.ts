import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AgentOrchestrator, NO_DATA_ERROR } from '../../services/orchestrator';
import { NO_DATA } from '../../utils/dataLoader';
import { SALES_CSV, bytes, fakeExecutor, fakePlanner, makePlan } from '../helpers';

const setup = () => {
  const planner = fakePlanner();
  const executor = fakeExecutor({
    answer: 'North leads with 17.',
    resultTable: { headers: ['region', 'sales'], rows: [{ region: 'North', sales: 17 }] },
    imagePath: '/charts/chart-1.json',
  });
  const orchestrator = new AgentOrchestrator({ planner, executor });
  return { planner, executor, orchestrator };
};

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('AgentOrchestrator.loadData', () => {
  it('loads a valid file and moves to DataLoaded', () => {
    const { orchestrator, executor } = setup();
    expect(orchestrator.state).toBe('NoData');

    const result = orchestrator.loadData(bytes(SALES_CSV), 'sales.csv');

    expect(result).toEqual({ ok: true, message: 'Successfully loaded 3 rows and 2 columns.' });
    expect(orchestrator.state).toBe('DataLoaded');
    expect(executor.setTable).toHaveBeenCalledTimes(1);
    expect(orchestrator.getFullContext()).toContain('DATAFRAME INFO:\nTotal Rows: 3');
  });

  it('reports rows, columns and names through getDataInfo', () => {
    const { orchestrator } = setup();
    orchestrator.loadData(bytes('name,score\nAlice,90\nBob,85\nCara,77\n'), 'scores.csv');

    const info = orchestrator.getDataInfo();
    expect(info).toContain('Total Rows: 3');
    expect(info).toContain('Total Columns: 2');
    expect(info).toContain('Column Names: name, score');
  });

  it('leaves everything untouched when validation fails', async () => {
    const { orchestrator, executor } = setup();
    orchestrator.loadData(bytes(SALES_CSV), 'sales.csv');
    await orchestrator.processQuery('Which region sells most?');

    const result = orchestrator.loadData(bytes('a\n1\n'), 'notes.txt');

    expect(result.ok).toBe(false);
    expect(orchestrator.getConversationHistory()).toHaveLength(2);
    expect(orchestrator.getDataPreview()?.rows).toHaveLength(3);
    expect(executor.setTable).toHaveBeenCalledTimes(1);
  });

  it('keeps the previous table when the new file has no rows', () => {
    const { orchestrator } = setup();
    orchestrator.loadData(bytes(SALES_CSV), 'sales.csv');

    const result = orchestrator.loadData(bytes('region,sales\n'), 'empty.csv');

    expect(result).toEqual({ ok: false, message: 'The uploaded file is empty.' });
    expect(orchestrator.getDataInfo()).toBe('Total Rows: 3\nTotal Columns: 2\nColumn Names: region, sales');
  });

  it('keeps the previous table when the new file cannot be parsed', () => {
    const { orchestrator, executor } = setup();
    orchestrator.loadData(bytes(SALES_CSV), 'sales.csv');

    const ragged = orchestrator.loadData(bytes('a,b\n1,2\n3,4,5\n'), 'ragged.csv');
    const corrupt = orchestrator.loadData(bytes('this is not a workbook\n'), 'broken.xlsx');

    expect(ragged).toEqual({ ok: false, message: 'Error parsing file: Expected 2 fields in row 3, saw 3' });
    expect(corrupt).toEqual({ ok: false, message: 'Error parsing file: File is not a valid Excel workbook.' });
    expect(orchestrator.state).toBe('DataLoaded');
    expect(orchestrator.getDataInfo()).toBe('Total Rows: 3\nTotal Columns: 2\nColumn Names: region, sales');
    expect(executor.setTable).toHaveBeenCalledTimes(1);
  });

  it('clears the conversation and refreshes the schema on a new file', async () => {
    const { orchestrator } = setup();
    orchestrator.loadData(bytes(SALES_CSV), 'sales.csv');
    await orchestrator.processQuery('q1');

    orchestrator.loadData(bytes('city\nOslo\n'), 'cities.csv');

    expect(orchestrator.getConversationHistory()).toEqual([]);
    expect(orchestrator.getFullContext()).toContain('  - city (object): 1/1 non-null | Sample: [Oslo]');
    expect(orchestrator.getLastPlan()).toBeNull();
  });
});

describe('AgentOrchestrator.processQuery', () => {
  it('fails fast without data and leaves memory alone', async () => {
    const { orchestrator, planner } = setup();

    const result = await orchestrator.processQuery('anything?');

    expect(result).toEqual({ success: false, answer: '', planDisplay: '', error: NO_DATA_ERROR });
    expect(orchestrator.getConversationHistory()).toHaveLength(0);
    expect(planner.createPlan).not.toHaveBeenCalled();
  });

  it('plans, executes and records the turn', async () => {
    const { orchestrator, planner, executor } = setup();
    orchestrator.loadData(bytes(SALES_CSV), 'sales.csv');

    const result = await orchestrator.processQuery('Which region sells most?');

    expect(result.success).toBe(true);
    expect(result.answer).toBe('North leads with 17.');
    expect(result.planDisplay).toBe(
      '**Goal:** Total sales per region\n\n**Execution Steps:**\n   1. Group by region\n   2. Sum sales\n\n**Columns:** region, sales',
    );
    expect(result.resultTable?.rows).toEqual([{ region: 'North', sales: 17 }]);
    expect(result.imagePath).toBe('/charts/chart-1.json');
    expect(result.error).toBeUndefined();

    const [question, schema, context] = planner.createPlan.mock.calls[0];
    expect(question).toBe('Which region sells most?');
    expect(schema.startsWith('COLUMNS AND DATA TYPES:')).toBe(true);
    expect(context).toBe('User: Which region sells most?');
    expect(executor.execute).toHaveBeenCalledWith(makePlan(), expect.objectContaining({ headers: ['region', 'sales'] }), 'Which region sells most?');

    const history = orchestrator.getConversationHistory();
    expect(history.map((m) => [m.role, m.content])).toEqual([
      ['user', 'Which region sells most?'],
      ['assistant', 'North leads with 17.'],
    ]);
    expect(history[1].executionPlan).toEqual(makePlan());
    expect(orchestrator.getLastPlan()).toEqual(makePlan());
  });

  it('records the question before planning', async () => {
    const { orchestrator, planner } = setup();
    orchestrator.loadData(bytes(SALES_CSV), 'sales.csv');
    let seen = -1;
    planner.createPlan.mockImplementation(async () => {
      seen = orchestrator.getConversationHistory().length;
      return makePlan();
    });

    await orchestrator.processQuery('q');

    expect(seen).toBe(1);
  });

  it('keeps the question in history when execution fails', async () => {
    const { orchestrator, executor } = setup();
    orchestrator.loadData(bytes(SALES_CSV), 'sales.csv');
    executor.execute.mockRejectedValueOnce(new Error('boom'));

    const result = await orchestrator.processQuery('Break please');

    expect(result).toEqual({
      success: false,
      answer: 'Error processing query: boom',
      planDisplay: '',
      error: 'Error processing query: boom',
    });
    expect(orchestrator.getConversationHistory().map((m) => m.content)).toEqual(['Break please']);
  });

  it('contains unexpected planner errors', async () => {
    const { orchestrator, planner } = setup();
    orchestrator.loadData(bytes(SALES_CSV), 'sales.csv');
    planner.createPlan.mockRejectedValueOnce(new Error('unexpected'));

    const result = await orchestrator.processQuery('q');

    expect(result.success).toBe(false);
    expect(result.error).toBe('Error processing query: unexpected');
    expect(result.resultTable).toBeUndefined();
    expect(orchestrator.getConversationHistory()).toHaveLength(1);
  });

  it('holds at most five messages across turns', async () => {
    const { orchestrator } = setup();
    orchestrator.loadData(bytes(SALES_CSV), 'sales.csv');

    await orchestrator.processQuery('q1');
    await orchestrator.processQuery('q2');
    await orchestrator.processQuery('q3');

    const history = orchestrator.getConversationHistory();
    expect(history).toHaveLength(5);
    expect(history[0].content).toBe('North leads with 17.');
    expect(history[4].content).toBe('North leads with 17.');
    expect(history[3].content).toBe('q3');
  });
});

describe('AgentOrchestrator.clearConversation and reset', () => {
  it('clearConversation keeps the table', async () => {
    const { orchestrator } = setup();
    orchestrator.loadData(bytes(SALES_CSV), 'sales.csv');
    await orchestrator.processQuery('q');

    orchestrator.clearConversation();

    expect(orchestrator.getConversationHistory()).toEqual([]);
    expect(orchestrator.state).toBe('DataLoaded');
    expect(orchestrator.getFullContext()).toContain('DATA SCHEMA:');
  });

  it('reset returns to NoData', async () => {
    const { orchestrator, executor } = setup();
    orchestrator.loadData(bytes(SALES_CSV), 'sales.csv');
    await orchestrator.processQuery('q');

    orchestrator.reset();

    expect(orchestrator.state).toBe('NoData');
    expect(orchestrator.getDataPreview()).toBeNull();
    expect(orchestrator.getConversationHistory()).toEqual([]);
    expect(orchestrator.getDataSchema()).toBe(NO_DATA);
    expect(orchestrator.getFullContext()).toBe('No context available.');
    expect(executor.clearTable).toHaveBeenCalledTimes(1);
  });
});

describe('AgentOrchestrator.getDataPreview', () => {
  it('returns the first n rows', () => {
    const { orchestrator } = setup();
    orchestrator.loadData(bytes(SALES_CSV), 'sales.csv');
    expect(orchestrator.getDataPreview(1)).toEqual({ headers: ['region', 'sales'], rows: [{ region: 'North', sales: 10 }] });
  });
});
