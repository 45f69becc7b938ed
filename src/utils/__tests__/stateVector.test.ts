import { mapStateArrayToVector, STATE_INDEX } from '../stateVector';

const baseState = (): unknown[] => {
  const state: unknown[] = Array(17).fill(null);
  state[STATE_INDEX.ICAO24] = '3c6444';
  state[STATE_INDEX.CALLSIGN] = 'DLH9LF  ';
  state[STATE_INDEX.ORIGIN_COUNTRY] = 'Germany';
  state[STATE_INDEX.TIME_POSITION] = 1700000000;
  state[STATE_INDEX.LAST_CONTACT] = 1700000004;
  state[STATE_INDEX.LONGITUDE] = 8.5706;
  state[STATE_INDEX.LATITUDE] = 50.0333;
  state[STATE_INDEX.BARO_ALTITUDE] = 1524;
  state[STATE_INDEX.ON_GROUND] = false;
  state[STATE_INDEX.VELOCITY] = 120.5;
  state[STATE_INDEX.SENSORS] = null;
  state[STATE_INDEX.SQUAWK] = '1000';
  state[STATE_INDEX.SPI] = false;
  state[STATE_INDEX.POSITION_SOURCE] = 0;
  return state;
};

describe('mapStateArrayToVector', () => {
  it('maps positional fields onto named properties', () => {
    const vector = mapStateArrayToVector(baseState());

    expect(vector).toMatchObject({
      icao24: '3c6444',
      callsign: 'DLH9LF',
      origin_country: 'Germany',
      last_contact: 1700000004,
      longitude: 8.5706,
      latitude: 50.0333,
      on_ground: false,
      squawk: '1000',
      sensors: null,
      category: null,
    });
  });

  it('lowercases the transponder address', () => {
    const state = baseState();
    state[STATE_INDEX.ICAO24] = 'ABC123';

    expect(mapStateArrayToVector(state).icao24).toBe('abc123');
  });

  it('returns a null identifier for blank or missing addresses', () => {
    const state = baseState();
    state[STATE_INDEX.ICAO24] = '   ';

    expect(mapStateArrayToVector(state).icao24).toBeNull();
    expect(mapStateArrayToVector([]).icao24).toBeNull();
  });

  it('nulls values of the wrong type', () => {
    const state = baseState();
    state[STATE_INDEX.LATITUDE] = '50.0';
    state[STATE_INDEX.ON_GROUND] = 0;

    const vector = mapStateArrayToVector(state);

    expect(vector.latitude).toBeNull();
    expect(vector.on_ground).toBeNull();
  });

  it('reads the category from extended responses', () => {
    const state = baseState();
    state[STATE_INDEX.CATEGORY] = 4;

    expect(mapStateArrayToVector(state).category).toBe(4);
  });
});
