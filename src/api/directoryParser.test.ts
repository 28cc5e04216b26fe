import { describe, it, expect } from 'vitest';
import { countEndpoints, findRegion, parseDirectory } from './directoryParser.js';
import { MalformedDirectory } from '../utils/errors.js';

const document = {
  groups: { wg: [{ name: 'wireguard', ports: [1337] }] },
  regions: [
    {
      id: 'swiss',
      name: 'Switzerland',
      country: 'CH',
      servers: {
        meta: [{ ip: '10.9.9.9', cn: 'zurich-meta' }],
        wg: [
          { ip: '1.2.3.4', cn: 'vienna401' },
          { ip: '1.2.3.5', cn: 'vienna402' },
        ],
      },
    },
    {
      id: 'de-frankfurt',
      name: 'DE Frankfurt',
      servers: {
        wg: [{ ip: '5.6.7.8', cn: 'frankfurt407' }],
      },
    },
    {
      id: 'ad',
      name: 'Andorra',
      servers: { ovpnudp: [{ ip: '9.9.9.9', cn: 'andorra401' }] },
    },
  ],
};

describe('parseDirectory', () => {
  it('yields every region and every WireGuard endpoint with its region link', () => {
    const directory = parseDirectory(document);

    expect(directory.regions).toHaveLength(3);
    expect(countEndpoints(directory)).toBe(3);
    expect(directory.endpoints.get('swiss')).toEqual([
      { hostname: 'vienna401', ip: '1.2.3.4', regionId: 'swiss' },
      { hostname: 'vienna402', ip: '1.2.3.5', regionId: 'swiss' },
    ]);
    expect(directory.endpoints.get('de-frankfurt')).toEqual([
      { hostname: 'frankfurt407', ip: '5.6.7.8', regionId: 'de-frankfurt' },
    ]);
  });

  it('gives regions without WireGuard servers an empty list', () => {
    const directory = parseDirectory(document);
    expect(directory.endpoints.get('ad')).toEqual([]);
  });

  it('orders regions by display name', () => {
    const directory = parseDirectory(document);
    expect(directory.regions.map(region => region.id)).toEqual(['ad', 'de-frankfurt', 'swiss']);
  });

  it('reads only the first line of the raw server list', () => {
    const raw = `${JSON.stringify(document)}\n\nc2lnbmF0dXJlLWJsb2NrLXBsYWNlaG9sZGVy\n`;
    const directory = parseDirectory(raw);

    expect(findRegion(directory, 'swiss')).toEqual({ id: 'swiss', displayName: 'Switzerland' });
    expect(countEndpoints(directory)).toBe(3);
  });

  it('drops repeated server entries but keeps a shared name on another address', () => {
    const repeated = {
      regions: [
        {
          id: 'swiss',
          name: 'Switzerland',
          servers: {
            wg: [
              { ip: '1.2.3.4', cn: 'zurich401' },
              { ip: '1.2.3.4', cn: 'zurich401' },
              { ip: '1.2.3.5', cn: 'zurich401' },
            ],
          },
        },
      ],
    };

    expect(parseDirectory(repeated).endpoints.get('swiss')).toEqual([
      { hostname: 'zurich401', ip: '1.2.3.4', regionId: 'swiss' },
      { hostname: 'zurich401', ip: '1.2.3.5', regionId: 'swiss' },
    ]);
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseDirectory('<html>maintenance</html>')).toThrow(MalformedDirectory);
  });

  it('rejects documents without a region list', () => {
    expect(() => parseDirectory({ servers: [] })).toThrow(MalformedDirectory);
  });

  it('rejects WireGuard entries without an address', () => {
    const broken = {
      regions: [{ id: 'swiss', name: 'Switzerland', servers: { wg: [{ cn: 'vienna401' }] } }],
    };
    expect(() => parseDirectory(broken)).toThrow(/regions\.0\.servers\.wg\.0\.ip/);
  });
});
