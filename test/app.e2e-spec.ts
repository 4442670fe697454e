import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, Logger } from '@nestjs/common';
import request from 'supertest';
import { AppModule } from './../src/app.module';
import { setupApp } from './../src/app.setup';
import { InferenceClientService } from './../src/prescription-safety/inference/inference-client.service';

describe('Prescription Safety API (e2e)', () => {
  let app: INestApplication;
  let inferenceClient: { invoke: jest.Mock; isConfigured: boolean };

  beforeEach(async () => {
    inferenceClient = { invoke: jest.fn(), isConfigured: false };

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(InferenceClientService)
      .useValue(inferenceClient)
      .compile();

    app = moduleFixture.createNestApplication({ logger: false });
    setupApp(app);
    await app.init();

    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await app.close();
  });

  describe('/api/v1 (GET)', () => {
    it('should return the API welcome message', () => {
      return request(app.getHttpServer())
        .get('/api/v1')
        .expect(200)
        .expect('Content-Type', /json/)
        .expect((res) => {
          expect(res.body).toEqual({
            message: 'Welcome to the Prescription Safety API',
            version: '1.0.0',
            endpoints: [
              '/prescription-safety/analyze',
              '/prescription-safety/status',
            ],
          });
        });
    });

    it('should return 404 for unknown routes', () => {
      return request(app.getHttpServer()).get('/api/v1/unknown').expect(404);
    });
  });

  describe('/api/v1/prescription-safety/analyze (POST)', () => {
    it('should reject a body without medications', () => {
      return request(app.getHttpServer())
        .post('/api/v1/prescription-safety/analyze')
        .send({ patient: { age: 40 } })
        .expect(400);
    });

    it('should reject a medication without a name', () => {
      return request(app.getHttpServer())
        .post('/api/v1/prescription-safety/analyze')
        .send({ medications: [{ dosage: '10mg' }] })
        .expect(400);
    });

    it('should return a system result for an empty prescription', () => {
      return request(app.getHttpServer())
        .post('/api/v1/prescription-safety/analyze')
        .send({ medications: [] })
        .expect(200)
        .expect((res) => {
          expect(res.body).toMatchObject({
            source: 'system',
            overallRisk: 'low',
            summary: 'No medications to analyze.',
            interactions: [],
          });
          expect(inferenceClient.invoke).not.toHaveBeenCalled();
        });
    });

    it('should return the AI analysis', () => {
      inferenceClient.isConfigured = true;
      inferenceClient.invoke.mockResolvedValue(
        JSON.stringify({
          interactions: [
            {
              drugs: ['Warfarin', 'Ibuprofen'],
              severity: 'major',
              description: 'Increased bleeding risk',
              recommendation: 'Avoid combination',
            },
          ],
          overall_risk: 'high',
          summary: 'Major interaction found',
        }),
      );

      return request(app.getHttpServer())
        .post('/api/v1/prescription-safety/analyze')
        .send({
          medications: [{ name: 'Warfarin' }, { name: 'Ibuprofen' }],
          patient: { age: 67, allergies: 'None known' },
        })
        .expect(200)
        .expect((res) => {
          expect(res.body.source).toBe('ai');
          expect(res.body.interpretation).toBe('structured');
          expect(res.body.overallRisk).toBe('high');
          expect(res.body.summary).toBe('Major interaction found');
          expect(res.body.interactions).toHaveLength(1);
          expect(inferenceClient.invoke).toHaveBeenCalledTimes(1);
          expect(inferenceClient.invoke.mock.calls[0][0]).toContain(
            '- Age: 67',
          );
        });
    });

    it('should fall back to the rule-based check when the API key is missing', () => {
      return request(app.getHttpServer())
        .post('/api/v1/prescription-safety/analyze')
        .send({
          medications: [{ name: 'Warfarin 5mg' }, { name: 'Aspirin 81mg' }],
        })
        .expect(200)
        .expect((res) => {
          expect(res.body.source).toBe('fallback');
          expect(res.body.overallRisk).toBe('high');
          expect(res.body.interactions).toEqual([
            {
              drugs: ['Warfarin 5mg', 'Aspirin 81mg'],
              severity: 'major',
              description: 'Increased bleeding risk',
              recommendation: 'Monitor INR closely, consider alternative',
            },
          ]);
          expect(inferenceClient.invoke).not.toHaveBeenCalled();
        });
    });
  });

  describe('/api/v1/prescription-safety/status (GET)', () => {
    it('should report the engine status', () => {
      return request(app.getHttpServer())
        .get('/api/v1/prescription-safety/status')
        .expect(200)
        .expect((res) => {
          expect(res.body).toMatchObject({ apiConfigured: false });
          expect(typeof res.body.enabled).toBe('boolean');
          expect(typeof res.body.maxRetries).toBe('number');
        });
    });
  });
});
