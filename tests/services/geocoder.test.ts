import { describe, it, expect, beforeEach, vi } from 'vitest';

const { ofetchMock } = vi.hoisted(() => ({ ofetchMock: vi.fn() }));

vi.mock('ofetch', () => ({ ofetch: ofetchMock }));

import { NominatimGeocoder } from '../../src/services/geocoder.js';

describe('NominatimGeocoder', () => {
  let geocoder: NominatimGeocoder;

  beforeEach(() => {
    ofetchMock.mockReset();
    geocoder = new NominatimGeocoder({ userAgent: 'TestAgent/1.0' });
  });

  it('should send a country-restricted single-result query', async () => {
    ofetchMock.mockResolvedValueOnce([{ lat: '51.1100', lon: '17.0300', display_name: 'Rynek' }]);

    await geocoder.geocode('Rynek');

    expect(ofetchMock).toHaveBeenCalledWith('https://nominatim.openstreetmap.org/search', {
      method: 'GET',
      query: {
        format: 'json',
        limit: 1,
        q: 'Rynek, Poland',
        addressdetails: 0,
        countrycodes: 'pl',
      },
      headers: { 'User-Agent': 'TestAgent/1.0' },
      timeout: 25000,
      retry: 0,
    });
  });

  it('should parse the best match', async () => {
    ofetchMock.mockResolvedValueOnce([{ lat: '51.1100', lon: '17.0300' }]);

    expect(await geocoder.geocode('Rynek')).toEqual({ lat: 51.11, lon: 17.03 });
  });

  it('should return null for an empty result set', async () => {
    ofetchMock.mockResolvedValueOnce([]);

    expect(await geocoder.geocode('Nieznana')).toBeNull();
  });

  it('should reject on an unexpected response shape', async () => {
    ofetchMock.mockResolvedValueOnce({ error: 'bad request' });

    await expect(geocoder.geocode('Rynek')).rejects.toThrow('Unexpected geocoder response');
  });

  it('should reject on non-numeric coordinates', async () => {
    ofetchMock.mockResolvedValueOnce([{ lat: 'north', lon: '17.03' }]);

    await expect(geocoder.geocode('Rynek')).rejects.toThrow('Unexpected coordinates');
  });
});
