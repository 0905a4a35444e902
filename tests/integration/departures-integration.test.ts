/**
 * Integration tests for GET /departures against a stand-in transit API
 *
 * The stand-in is an Express server on an ephemeral localhost port, so the
 * real axios client, request body and status handling are exercised.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import request from 'supertest';
import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { createApp } from '../../src/app.js';
import { DepartureService } from '../../src/services/departure-service.js';
import { TransitApiClient } from '../../src/services/transit-api-client.js';
import { malmiPayload } from '../fixtures/transit-payloads.js';

interface ReceivedRequest {
  contentType: string | undefined;
  correlationId: string | undefined;
  subscriptionKey: string | undefined;
  body: unknown;
}

type StandInBehaviour = (req: Request, res: Response) => void;

function listen(app: Express): Promise<Server> {
  return new Promise((resolve) => {
    const server = app.listen(0, '127.0.0.1', () => resolve(server));
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.closeAllConnections();
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

function urlOf(server: Server): string {
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Stand-in server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}/graphql`;
}

const silentLogger = {
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
};

function createProxy(url: string, timeoutMs = 1000): Express {
  const client = new TransitApiClient({ url, timeoutMs, apiKey: 'test-key' });
  return createApp({
    departureService: new DepartureService({ client, logger: silentLogger }),
    logger: silentLogger,
  });
}

describe('Departures proxy integration', () => {
  let standIn: Server;
  let proxy: Express;
  let behaviour: StandInBehaviour;
  const received: ReceivedRequest[] = [];

  beforeAll(async () => {
    const standInApp = express();
    standInApp.post('/graphql', express.text({ type: 'application/graphql' }), (req, res) => {
      received.push({
        contentType: req.get('content-type'),
        correlationId: req.get('x-correlation-id'),
        subscriptionKey: req.get('digitransit-subscription-key'),
        body: req.body,
      });
      behaviour(req, res);
    });
    standIn = await listen(standInApp);
    proxy = createProxy(urlOf(standIn));
  });

  afterAll(async () => {
    await close(standIn);
  });

  beforeEach(() => {
    received.length = 0;
    behaviour = (req, res) => {
      res.status(200).json(malmiPayload());
    };
  });

  it('should return ranked departures from the transit API', async () => {
    const response = await request(proxy).get('/departures?stops=H3030&n=5').expect(200);

    expect(response.body.departures.map((d: { estimated: string }) => d.estimated)).toEqual([
      '2001-09-09T01:48:40.000Z',
      '2001-09-09T01:50:00.000Z',
    ]);
  });

  it('should send the GraphQL query as an application/graphql body', async () => {
    await request(proxy)
      .get('/departures?stops=H3030&n=3')
      .set('X-Correlation-ID', 'test-corr-789')
      .expect(200);

    expect(received).toHaveLength(1);
    expect(received[0].contentType).toBe('application/graphql');
    expect(received[0].correlationId).toBe('test-corr-789');
    expect(received[0].subscriptionKey).toBe('test-key');
    expect(received[0].body).toContain('stops(name: "H3030")');
    expect(received[0].body).toContain('numberOfDepartures: 3');
  });

  it('should return 404 when the transit API matches no stops', async () => {
    behaviour = (req, res) => {
      res.status(200).json({ data: { stops: [] } });
    };

    const response = await request(proxy).get('/departures?stops=nowhere').expect(404);

    expect(response.body.detail).toBe('No stops matching the query were found.');
  });

  it('should return 502 when the transit API answers 503', async () => {
    behaviour = (req, res) => {
      res.status(503).send('Service Unavailable');
    };

    const response = await request(proxy).get('/departures?stops=H3030').expect(502);

    expect(response.body).toEqual({
      error: 'BadUpstreamStatus',
      detail: 'Request to HSL API failed with code 503.',
    });
  });

  it('should return 500 when the transit API answers 200 with a non-JSON body', async () => {
    behaviour = (req, res) => {
      res.status(200).type('text/html').send('<html>maintenance</html>');
    };

    const response = await request(proxy).get('/departures?stops=H3030').expect(500);

    expect(response.body.error).toBe('ParseFailure');
  });

  it('should return 500 when the transit API does not answer in time', async () => {
    const slowProxy = createProxy(urlOf(standIn), 50);
    behaviour = (req, res) => {
      const timer = setTimeout(() => res.status(200).json(malmiPayload()), 500);
      res.on('close', () => clearTimeout(timer));
    };

    const response = await request(slowProxy).get('/departures?stops=H3030').expect(500);

    expect(response.body).toEqual({
      error: 'UpstreamUnreachable',
      detail: 'Unexpected error when fetching data from HSL.',
    });
  });

  it('should return 500 when the transit API refuses connections', async () => {
    const closedServer = await listen(express());
    const closedUrl = urlOf(closedServer);
    await close(closedServer);

    const response = await request(createProxy(closedUrl)).get('/departures?stops=H3030').expect(500);

    expect(response.body).toEqual({
      error: 'UpstreamUnreachable',
      detail: 'Unexpected error when fetching data from HSL.',
    });
  });

  it('should answer the liveness check', async () => {
    const response = await request(proxy).get('/').expect(200);

    expect(typeof response.body.pong).toBe('string');
    expect(Number.isNaN(Date.parse(response.body.pong))).toBe(false);
  });
});
