import { TrafficSimulator, SIMULATED_COUNTRY } from '../TrafficSimulator';
import { isWithinBounds } from '../../utils/aircraftState';
import { SAO_PAULO_BOX } from '../../__tests__/fixtures/aircraftFixtures';

describe('TrafficSimulator', () => {
  it('generates the requested number of observations inside the region', () => {
    const observations = new TrafficSimulator().generate(SAO_PAULO_BOX, 25);

    expect(observations).toHaveLength(25);
    observations.forEach((observation) => {
      expect(isWithinBounds(observation, SAO_PAULO_BOX)).toBe(true);
      expect(observation.callsign).toMatch(/^[A-Z]{3}\d{3,4}$/);
      expect(observation.icao24).toMatch(/^[0-9a-f]{6}$/);
      expect(observation.altitudeM).toBeGreaterThanOrEqual(3000);
      expect(observation.altitudeM).toBeLessThanOrEqual(12000);
      expect(observation.groundSpeedMps).toBeGreaterThanOrEqual(180);
      expect(observation.groundSpeedMps).toBeLessThanOrEqual(260);
      expect(observation.originCountry).toBe(SIMULATED_COUNTRY);
      expect(observation.onGround).toBe(false);
    });
  });

  it('is deterministic with an injected random source', () => {
    const [observation] = new TrafficSimulator(() => 0).generate(SAO_PAULO_BOX, 1);

    expect(observation).toEqual({
      icao24: '000000',
      callsign: 'TAM100',
      latitude: -24.5,
      longitude: -47.5,
      groundSpeedMps: 180,
      altitudeM: 3000,
      verticalRateMps: -10,
      originCountry: 'Simulated',
      onGround: false,
    });
  });

  it('generates nothing for a non-positive count', () => {
    const simulator = new TrafficSimulator();
    expect(simulator.generate(SAO_PAULO_BOX, 0)).toEqual([]);
    expect(simulator.generate(SAO_PAULO_BOX, -3)).toEqual([]);
  });
});
