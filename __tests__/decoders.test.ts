import {
  decodeAdvisories,
  decodeNextArrivals,
  decodeRouteShapes,
  decodeSchedules,
  decodeStops,
  decodeVehicles,
} from '../server/lib/decoders';
import { FeedError } from '../server/lib/errors';
import { silenceConsole } from './support/fakes';

beforeEach(() => {
  silenceConsole();
});

afterEach(() => {
  jest.restoreAllMocks();
});

function decodeError(decode: () => unknown): FeedError {
  try {
    decode();
  } catch (error: unknown) {
    if (error instanceof FeedError) return error;
    throw error;
  }
  throw new Error('expected a FeedError');
}

describe('decodeVehicles', () => {
  it('maps feed fields and parses coordinates', () => {
    const body = JSON.stringify([
      {
        lat: '39.9566', lon: '-75.1819', trainno: '9230', service: 'LOCAL', dest: 'Doylestown',
        currentstop: 'Temple U', nextstop: 'Wayne Junction', line: 'Lansdale/Doylestown',
        consist: '712,711', late: 3, TRACK: '2', TRACK_CHANGE: '',
      },
    ]);

    expect(decodeVehicles(body)).toEqual([
      {
        trainNo: '9230',
        lat: 39.9566,
        lon: -75.1819,
        line: 'Lansdale/Doylestown',
        dest: 'Doylestown',
        currentStop: 'Temple U',
        nextStop: 'Wayne Junction',
        service: 'LOCAL',
        consist: '712,711',
        track: '2',
        trackChange: '',
        lateMinutes: 3,
      },
    ]);
  });

  it('treats unparsable coordinates as 0 and missing fields as null', () => {
    const [vehicle] = decodeVehicles(JSON.stringify([{ lat: '', lon: 'n/a', trainno: 512 }]));

    expect(vehicle.trainNo).toBe('512');
    expect(vehicle.lat).toBe(0);
    expect(vehicle.lon).toBe(0);
    expect(vehicle.dest).toBeNull();
    expect(vehicle.lateMinutes).toBeNull();
  });

  it('drops records without a train number', () => {
    const body = JSON.stringify([{ lat: '1', lon: '2' }, { lat: '1', lon: '2', trainno: '7' }]);

    expect(decodeVehicles(body).map(v => v.trainNo)).toEqual(['7']);
  });

  it('classifies empty and malformed bodies', () => {
    expect(decodeError(() => decodeVehicles('  ')).kind).toBe('NoData');
    expect(decodeError(() => decodeVehicles('<html>')).kind).toBe('DecodingError');
    expect(decodeError(() => decodeVehicles('{"trainno":"1"}')).kind).toBe('DecodingError');
  });
});

describe('decodeNextArrivals', () => {
  const direct = {
    orig_train: '9545', orig_line: 'Paoli/Thorndale', orig_departure_time: '3:15PM',
    orig_arrival_time: '3:52PM', orig_delay: '4 mins', isdirect: 'true',
  };

  it('decodes a direct trip with a typed delay', () => {
    expect(decodeNextArrivals(JSON.stringify([direct]))).toEqual([
      {
        origTrain: '9545',
        origLine: 'Paoli/Thorndale',
        origDepartureTime: '3:15PM',
        origArrivalTime: '3:52PM',
        origDelayMinutes: 4,
        isDirect: true,
      },
    ]);
  });

  it('decodes a trip with a connection', () => {
    const record = {
      ...direct,
      orig_delay: 'On time',
      isdirect: 'false',
      Connection: 'Suburban Station',
      term_train: '6312',
      term_line: 'Chestnut Hill East',
      term_depart_time: '4:05PM',
      term_arrival_time: '4:40PM',
      term_delay: '2 mins',
    };

    expect(decodeNextArrivals(JSON.stringify([record]))).toEqual([
      {
        origTrain: '9545',
        origLine: 'Paoli/Thorndale',
        origDepartureTime: '3:15PM',
        origArrivalTime: '3:52PM',
        origDelayMinutes: 0,
        isDirect: false,
        connectionStation: 'Suburban Station',
        termTrain: '6312',
        termLine: 'Chestnut Hill East',
        termDepartureTime: '4:05PM',
        termArrivalTime: '4:40PM',
        termDelayMinutes: 2,
      },
    ]);
  });

  it('falls back to a direct trip when the connection leg is incomplete', () => {
    const record = { ...direct, isdirect: 'false', Connection: 'Suburban Station', term_train: null };

    const [arrival] = decodeNextArrivals(JSON.stringify([record]));

    expect(arrival.isDirect).toBe(true);
    expect(console.warn).toHaveBeenCalled();
  });

  it('keeps an unparsable delay as null', () => {
    const [arrival] = decodeNextArrivals(JSON.stringify([{ ...direct, orig_delay: 'Suspended' }]));

    expect(arrival.origDelayMinutes).toBeNull();
  });

  it('accepts an empty list', () => {
    expect(decodeNextArrivals('[]')).toEqual([]);
  });
});

describe('reference data decoders', () => {
  it('decodes the stop list preserving spelling', () => {
    expect(decodeStops('{"stops":["30th Street Station","Norristown T.C."]}'))
      .toEqual(['30th Street Station', 'Norristown T.C.']);
    expect(decodeError(() => decodeStops('{"stops":[1,2]}')).kind).toBe('DecodingError');
  });

  it('decodes schedules without reordering stops', () => {
    const body = JSON.stringify({
      PAO: {
        'mon-fri': {
          outbound: [{ train: '9545', stops: [['Suburban Station', '3:15PM'], ['Ardmore', '3:32PM'], ['Paoli', '3:52PM']] }],
        },
      },
    });

    expect(decodeSchedules(body)).toEqual({
      PAO: {
        'mon-fri': {
          outbound: [
            {
              trainNo: '9545',
              stops: [
                { stop: 'Suburban Station', time: '3:15PM' },
                { stop: 'Ardmore', time: '3:32PM' },
                { stop: 'Paoli', time: '3:52PM' },
              ],
            },
          ],
        },
      },
    });
  });

  it('rejects a schedule stop that is not a pair', () => {
    const body = JSON.stringify({ PAO: { sat: { inbound: [{ train: '1', stops: [['Paoli']] }] } } });

    expect(decodeError(() => decodeSchedules(body)).message).toBe('Schedules.PAO.sat.inbound[0].stops[0]: expected a [stop, time] pair');
  });

  it('decodes advisories with a null current list', () => {
    const body = JSON.stringify({
      current: null,
      advisory: [{ title: 'Track work', dates_affected: 'Sat-Sun', description: 'https://example.test/notice' }],
    });

    expect(decodeAdvisories(body)).toEqual({
      current: null,
      advisory: [{ title: 'Track work', datesAffected: 'Sat-Sun', description: 'https://example.test/notice' }],
    });
  });

  it('keeps only multi-line route geometries', () => {
    const body = JSON.stringify({
      type: 'FeatureCollection',
      features: [
        {
          type: 'Feature',
          properties: { route_id: 'PAO', route_long_name: 'Paoli/Thorndale', route_color: '#91456C' },
          geometry: { type: 'MultiLineString', coordinates: [[[-75.1, 39.9], [-75.2, 40.0]]] },
        },
        {
          type: 'Feature',
          properties: { route_id: 'WAR' },
          geometry: { type: 'LineString', coordinates: [[-75.1, 39.9], [-75.2, 40.1]] },
        },
        {
          type: 'Feature',
          properties: { route_id: 'CYN' },
          geometry: { type: 'MultiLineString', coordinates: [[-75.3, 40.0], [-75.4, 40.1]] },
        },
      ],
    });

    expect(decodeRouteShapes(body)).toEqual([
      { routeId: 'PAO', name: 'Paoli/Thorndale', color: '#91456C', lines: [[[-75.1, 39.9], [-75.2, 40.0]]] },
      { routeId: 'CYN', name: null, color: null, lines: [[[-75.3, 40.0], [-75.4, 40.1]]] },
    ]);
  });
});
