import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi, type Mock } from 'vitest';
import axios from 'axios';
import nock from 'nock';
import type { BoundingBox } from '@osm-houses/shared';
import {
  OverpassClient,
  buildAddress,
  toBuildingRecord,
} from '../../../src/services/osm/overpass-client.js';

describe('OverpassClient', () => {
  const HOST = 'https://overpass.test';
  const BASE_URL = `${HOST}/api`;
  const berlin: BoundingBox = { south: 52.35, north: 52.65, west: 13.15, east: 13.65 };

  let sleep: Mock<(ms: number) => Promise<void>>;
  let client: OverpassClient;

  const musterStr = {
    type: 'node',
    id: 123456789,
    lat: 52.52,
    lon: 13.405,
    tags: {
      'addr:street': 'Muster Str',
      'addr:housenumber': '12',
      'addr:postcode': '10115',
      'addr:city': 'Berlin',
      building: 'residential',
      'building:levels': '3',
    },
  };

  const hauptstrasse = {
    type: 'way',
    id: 2002,
    center: { lat: 52.5, lon: 13.4 },
    tags: {
      'addr:street': 'Hauptstraße',
      'addr:housenumber': '5',
      building: 'apartments',
    },
  };

  const noStreet = {
    type: 'way',
    id: 3003,
    center: { lat: 52.49, lon: 13.41 },
    tags: { 'addr:housenumber': '7', building: 'house' },
  };

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => {});
    client = new OverpassClient({ baseURL: BASE_URL, sleep });
    nock.cleanAll();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  describe('fetchResidentialBuildings', () => {
    it('should return only elements with house number and street', async () => {
      nock(HOST)
        .post('/api/interpreter')
        .reply(200, { elements: [musterStr, hauptstrasse, noStreet] });

      const buildings = await client.fetchResidentialBuildings(berlin, 4);

      expect(buildings).toEqual([
        {
          address: 'Muster Str, 12, 10115, Berlin',
          latitude: 52.52,
          longitude: 13.405,
          externalId: 123456789,
          buildingType: 'residential',
          levels: '3',
        },
        {
          address: 'Hauptstraße, 5',
          latitude: 52.5,
          longitude: 13.4,
          externalId: 2002,
          buildingType: 'apartments',
          levels: 'N/A',
        },
      ]);
      expect(client.getStats()).toEqual({ requests: 1, errors: 0, parseFailures: 0 });
    });

    it('should skip a malformed element and keep the rest', async () => {
      const brokenNode = { type: 'node', id: 9, tags: { 'addr:street': 'A', 'addr:housenumber': '1' } };
      const third = { ...hauptstrasse, id: 2003, tags: { ...hauptstrasse.tags, 'addr:housenumber': '6' } };

      nock(HOST)
        .post('/api/interpreter')
        .reply(200, { elements: [musterStr, brokenNode, hauptstrasse, third] });

      const buildings = await client.fetchResidentialBuildings(berlin, 10);

      expect(buildings.map((b) => b.externalId)).toEqual([123456789, 2002, 2003]);
      expect(client.getStats().parseFailures).toBe(1);
    });

    it('should return empty list when no elements match', async () => {
      nock(HOST).post('/api/interpreter').reply(200, { elements: [] });

      const buildings = await client.fetchResidentialBuildings(berlin, 10);
      expect(buildings).toEqual([]);
      expect(client.getStats().errors).toBe(0);
    });

    it('should return empty list for a malformed payload', async () => {
      nock(HOST).post('/api/interpreter').reply(200, { remark: 'runtime error' });

      const buildings = await client.fetchResidentialBuildings(berlin, 10);
      expect(buildings).toEqual([]);
      expect(client.getStats()).toEqual({ requests: 1, errors: 0, parseFailures: 0 });
    });

    it('should return empty list for a non-JSON body', async () => {
      nock(HOST).post('/api/interpreter').reply(200, 'not json at all');

      const buildings = await client.fetchResidentialBuildings(berlin, 10);
      expect(buildings).toEqual([]);
    });
  });

  describe('retries', () => {
    it('should stop after maxRetries when rate limited on every attempt', async () => {
      const scope = nock(HOST).post('/api/interpreter').times(2).reply(429);

      const buildings = await client.fetchResidentialBuildings(berlin, 10);

      expect(buildings).toEqual([]);
      expect(scope.isDone()).toBe(true);
      expect(client.getStats()).toEqual({ requests: 2, errors: 1, parseFailures: 0 });
      expect(sleep.mock.calls).toEqual([[10_000], [20_000]]);
    });

    it('should scale the rate-limit wait with the attempt number', async () => {
      client = new OverpassClient({ baseURL: BASE_URL, sleep, maxRetries: 3 });
      nock(HOST).post('/api/interpreter').times(3).reply(429);

      await client.fetchResidentialBuildings(berlin, 10);

      expect(sleep.mock.calls).toEqual([[10_000], [20_000], [30_000]]);
      expect(client.getStats().requests).toBe(3);
    });

    it('should retry after a network error and return the later result', async () => {
      nock(HOST)
        .post('/api/interpreter')
        .replyWithError({ code: 'ECONNRESET', message: 'socket hang up' })
        .post('/api/interpreter')
        .reply(200, { elements: [musterStr] });

      const buildings = await client.fetchResidentialBuildings(berlin, 10);

      expect(buildings).toHaveLength(1);
      expect(sleep).toHaveBeenCalledWith(3_000);
      expect(client.getStats()).toEqual({ requests: 2, errors: 0, parseFailures: 0 });
    });

    it('should not wait after the final failed attempt', async () => {
      nock(HOST).post('/api/interpreter').times(2).reply(504, 'Gateway Timeout');

      const buildings = await client.fetchResidentialBuildings(berlin, 10);

      expect(buildings).toEqual([]);
      expect(sleep.mock.calls).toEqual([[3_000]]);
      expect(client.getStats()).toEqual({ requests: 2, errors: 1, parseFailures: 0 });
    });

    it('should give up immediately on an unexpected error', async () => {
      const http = axios.create({ baseURL: BASE_URL });
      const post = vi.spyOn(http, 'post').mockRejectedValue(new TypeError('boom'));
      client = new OverpassClient({ http, sleep, maxRetries: 3 });

      const buildings = await client.fetchResidentialBuildings(berlin, 10);

      expect(buildings).toEqual([]);
      expect(post).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
      expect(client.getStats()).toEqual({ requests: 1, errors: 1, parseFailures: 0 });
    });
  });

  describe('buildQuery', () => {
    it('should select the three residential building types inside the bbox', () => {
      const query = client.buildQuery(berlin, 8);

      expect(query).toBe(
        [
          '[out:json][timeout:30];',
          '(',
          '  nwr["building"="residential"]["addr:housenumber"]["addr:street"](52.35,13.15,52.65,13.65);',
          '  nwr["building"="apartments"]["addr:housenumber"]["addr:street"](52.35,13.15,52.65,13.65);',
          '  nwr["building"="house"]["addr:housenumber"]["addr:street"](52.35,13.15,52.65,13.65);',
          ');',
          'out center 8;',
        ].join('\n')
      );
    });
  });
});

describe('buildAddress', () => {
  it('should join present parts in street, number, postcode, city order', () => {
    expect(
      buildAddress({
        'addr:city': 'Paris',
        'addr:housenumber': '3',
        'addr:street': 'Rue de Rivoli',
      })
    ).toBe('Rue de Rivoli, 3, Paris');
  });
});

describe('toBuildingRecord', () => {
  const tags = { 'addr:street': 'Kerkstraat', 'addr:housenumber': '10' };

  it('should use the center of a relation', () => {
    const record = toBuildingRecord({
      type: 'relation',
      id: 'r77',
      center: { lat: 52.37, lon: 4.89 },
      tags,
    });

    expect(record).toEqual({
      address: 'Kerkstraat, 10',
      latitude: 52.37,
      longitude: 4.89,
      externalId: 'r77',
      buildingType: 'N/A',
      levels: 'N/A',
    });
  });

  it('should skip a way without center', () => {
    expect(toBuildingRecord({ type: 'way', id: 1, tags })).toBeNull();
  });

  it('should skip an element without tags', () => {
    expect(toBuildingRecord({ type: 'node', id: 1, lat: 1, lon: 2 })).toBeNull();
  });

  it('should throw on an unknown element type', () => {
    expect(() => toBuildingRecord({ type: 'area', id: 1, tags })).toThrow();
  });
});
