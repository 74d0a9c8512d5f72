import { createSensorStore } from './sensors';

describe('createSensorStore', () => {
  it('should keep the latest sample per entity', () => {
    const store = createSensorStore();

    store.accept('sensor.living_temp', 20.1, 100);
    store.accept('sensor.living_temp', 20.4, 110, { unit: 'C' });

    expect(store.get('sensor.living_temp')).toEqual({
      value: 20.4,
      attributes: { unit: 'C' },
      timestamp: 110
    });
  });

  it('should discard samples older than the last accepted one', () => {
    const store = createSensorStore();

    expect(store.accept('sensor.living_temp', 20.4, 110)).toBe(true);
    expect(store.accept('sensor.living_temp', 19.0, 105)).toBe(false);

    expect(store.get('sensor.living_temp')?.value).toBe(20.4);
  });

  it('should accept samples with an equal timestamp', () => {
    const store = createSensorStore();

    store.accept('sensor.living_temp', 20.4, 110);
    expect(store.accept('sensor.living_temp', 20.5, 110)).toBe(true);
    expect(store.get('sensor.living_temp')?.value).toBe(20.5);
  });

  it('should track entities independently', () => {
    const store = createSensorStore();

    store.accept('sensor.a', 1, 200);
    expect(store.accept('sensor.b', 2, 100)).toBe(true);
    expect(store.size()).toBe(2);

    store.remove('sensor.a');
    expect(store.get('sensor.a')).toBeNull();
  });
});
