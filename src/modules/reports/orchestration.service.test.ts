import fs from 'fs/promises';
import path from 'path';
import { HealthScoreOrchestrator } from './orchestration.service';
import { PillarScoreSet } from '../healthScore/healthScore.types';
import { FakeChartRenderer, FakeDocumentRenderer } from '../../testing/fakes';
import { makeTempDir, removeDir } from '../../testing/fixtures';

const scores = PillarScoreSet.fromPillars({
  musclesAndVisceralFat: 80,
  cardioVascular: 100,
  sleep: 0,
  cognitive: 0,
  metabolic: 0,
  emotional: 0,
});

describe('HealthScoreOrchestrator', () => {
  let dir: string;
  let charts: FakeChartRenderer;
  let documents: FakeDocumentRenderer;
  let orchestrator: HealthScoreOrchestrator;

  beforeEach(async () => {
    dir = await makeTempDir();
    charts = new FakeChartRenderer(path.join(dir, 'charts'));
    documents = new FakeDocumentRenderer(path.join(dir, 'reports'));
    orchestrator = new HealthScoreOrchestrator(charts, documents);
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(dir);
  });

  it('renders the chart and passes it to the document renderer', async () => {
    const result = await orchestrator.process(scores, 'Ada Tester');
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(documents.calls).toHaveLength(1);
    expect(documents.calls[0].chartPath).toBe(result.data.chartPath);
    expect(documents.calls[0].userName).toBe('Ada Tester');
    expect(result.data.userName).toBe('Ada Tester');
    expect(result.data.pillarScores).toBe(scores);
    expect(result.data.pillarScores.toJSON()).toEqual({
      musclesAndVisceralFat: 80,
      cardioVascular: 100,
      sleep: 0,
      cognitive: 0,
      metabolic: 0,
      emotional: 0,
      overall: 30,
    });
    await expect(fs.access(result.data.pdfPath)).resolves.toBeUndefined();
  });

  it('fails without a document path when the document renderer throws', async () => {
    documents.failure = new Error('disk full');
    const result = await orchestrator.process(scores, 'User');
    expect(result).toEqual({ success: false, message: 'Failed to process health scores', details: 'disk full' });
    expect('data' in result).toBe(false);
    // the chart was produced and is left behind
    expect(charts.calls).toHaveLength(1);
    expect(await fs.readdir(path.join(dir, 'charts'))).toHaveLength(1);
  });

  it('skips the document when the chart renderer throws', async () => {
    charts.failure = new Error('no fonts');
    const result = await orchestrator.process(scores, 'User');
    expect(result).toEqual({ success: false, message: 'Failed to process health scores', details: 'no fonts' });
    expect(documents.calls).toHaveLength(0);
  });
});
