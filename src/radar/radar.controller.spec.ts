import {
  BadRequestException,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';
import {
  ConfigurationEmptyError,
  KnowledgeStoreUnavailableError,
} from './errors/radar.errors';
import { RadarController } from './radar.controller';
import { storedArticle } from './testing/radar-test.fixtures';

describe('RadarController', () => {
  const pipeline = {
    run: jest.fn(),
  };
  const inquisitor = {
    ask: jest.fn(),
  };
  const store = {
    open: jest.fn().mockResolvedValue(undefined),
    allSince: jest.fn(),
  };
  const embedding = { modelId: 'fake:embedding-v1' };
  const controller = new RadarController(
    pipeline as never,
    inquisitor as never,
    store as never,
    embedding as never,
  );

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('reports health', () => {
    expect(controller.getHealth()).toEqual({ status: 'ok', service: 'stack-radar' });
  });

  it('maps configuration failures to 422', async () => {
    pipeline.run.mockRejectedValue(new ConfigurationEmptyError('no technologies configured'));

    await expect(controller.scan()).rejects.toBeInstanceOf(UnprocessableEntityException);
  });

  it('maps store failures to 503', async () => {
    pipeline.run.mockRejectedValue(new KnowledgeStoreUnavailableError('disk full'));

    await expect(controller.scan()).rejects.toBeInstanceOf(ServiceUnavailableException);
  });

  it('passes other failures through', async () => {
    const failure = new Error('unexpected');
    pipeline.run.mockRejectedValue(failure);

    await expect(controller.scan()).rejects.toBe(failure);
  });

  it('lists articles without their vectors', async () => {
    store.allSince.mockReturnValue([
      storedArticle({ identity: 'https://example.test/a', criticality: 'HIGH' }),
    ]);

    const rows = await controller.getArticles('2026-03-01T00:00:00Z', 'high');

    expect(store.open).toHaveBeenCalledWith('fake:embedding-v1');
    expect(store.allSince).toHaveBeenCalledWith(
      new Date('2026-03-01T00:00:00.000Z'),
      'HIGH',
    );
    expect(rows).toHaveLength(1);
    expect(rows[0].identity).toBe('https://example.test/a');
    expect('embedding' in rows[0]).toBe(false);
  });

  it('defaults the article filter to everything', async () => {
    store.allSince.mockReturnValue([]);

    await controller.getArticles();

    expect(store.allSince).toHaveBeenCalledWith(new Date(0), 'NONE');
  });

  it('validates article filters', async () => {
    await expect(controller.getArticles('yesterday')).rejects.toBeInstanceOf(
      BadRequestException,
    );
    await expect(controller.getArticles(undefined, 'URGENT')).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it('requires a question', async () => {
    await expect(controller.inquire('  ')).rejects.toBeInstanceOf(BadRequestException);
    await expect(controller.inquire(42)).rejects.toBeInstanceOf(BadRequestException);
    expect(inquisitor.ask).not.toHaveBeenCalled();
  });

  it('forwards questions to the inquisitor', async () => {
    const turn = { status: 'answered', question: 'q', answer: 'a', sources: [] };
    inquisitor.ask.mockResolvedValue(turn);

    await expect(controller.inquire('q')).resolves.toBe(turn);
    expect(inquisitor.ask).toHaveBeenCalledWith('q');
  });
});
