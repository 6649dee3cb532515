import express, { Request, Response } from 'express';
import request from 'supertest';

import { InMemoryMetricsRecorder } from '../../metrics/InMemoryMetricsRecorder';
import { requestMetrics } from '../requestMetrics';

describe('Request metrics middleware', () => {
  let recorder: InMemoryMetricsRecorder;
  let app: express.Express;

  beforeEach(() => {
    recorder = new InMemoryMetricsRecorder();
    app = express();
    app.use(requestMetrics(recorder));
    app.get('/items/list', (_req: Request, res: Response) => {
      res.status(200).json({ ok: true });
    });
  });

  it('should record one observation per response', async () => {
    // Act
    await request(app).get('/items/list?page=2');

    // Assert
    const observations = recorder.requests();
    expect(observations).toHaveLength(1);
    expect(observations[0]).toMatchObject({ method: 'GET', route: '/items/list', status: 200 });
    expect(
      recorder.counterValue('http_requests_total', {
        method: 'GET',
        route: '/items/list',
        status: '200',
      })
    ).toBe(1);
  });

  it('should label unmatched routes', async () => {
    // Act
    await request(app).get('/nowhere/123');

    // Assert
    expect(recorder.requests()[0]).toMatchObject({ route: 'unmatched', status: 404 });
  });
});
