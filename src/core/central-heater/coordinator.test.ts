import { createLoggerMock } from '$test-utils';
import { createSimulatedClock } from '@utils/time';
import { createCentralHeaterCoordinator, effectiveTiming } from './coordinator';
import type { ActuatorCommander } from '@hardware/actuator';
import type { CentralHeaterCoordinator } from './types';

function createCommanderMock(): ActuatorCommander & { command: ReturnType<typeof vi.fn> } {
  return {
    command: vi.fn(),
    lastCommanded: vi.fn(function() {
      return null;
    }),
    whenIdle: vi.fn(function() {
      return Promise.resolve();
    })
  };
}

describe('central heater coordinator', () => {
  let clock: ReturnType<typeof createSimulatedClock>;
  let commander: ReturnType<typeof createCommanderMock>;
  let logger: ReturnType<typeof createLoggerMock>;

  function create(onDelaySec: number, offDelaySec: number): CentralHeaterCoordinator {
    const coordinator = createCentralHeaterCoordinator('boiler', {
      commander: commander,
      timerApi: clock.timerApi,
      timeSource: clock.now,
      logger: logger
    });
    coordinator.subscribe('living', { onDelaySec: onDelaySec, offDelaySec: offDelaySec });
    coordinator.subscribe('office', { onDelaySec: onDelaySec, offDelaySec: offDelaySec });
    return coordinator;
  }

  function actions(): string[] {
    return commander.command.mock.calls.map(function(call: unknown[]) {
      return String(call[0]) + ":" + String(call[1]);
    });
  }

  beforeEach(() => {
    clock = createSimulatedClock();
    commander = createCommanderMock();
    logger = createLoggerMock();
  });

  describe('on-delay', () => {
    it('should not command on before the delay', () => {
      const coordinator = create(30, 60);
      coordinator.register('living');
      expect(coordinator.snapshot().onDueAt).toBe(30);

      clock.advance(29999);
      expect(commander.command).not.toHaveBeenCalled();

      clock.advance(1);
      expect(actions()).toEqual(['boiler:on']);
      expect(coordinator.isCommandedOn()).toBe(true);
    });

    it('should command at once with a zero delay', () => {
      const coordinator = create(0, 60);
      coordinator.register('living');
      expect(actions()).toEqual(['boiler:on']);
      expect(coordinator.isSettled()).toBe(true);
    });

    it('should do nothing when demand emptied before expiry', () => {
      const coordinator = create(30, 60);
      coordinator.register('living');
      clock.advanceTo(10);
      coordinator.deregister('living');
      clock.advanceTo(60);
      expect(commander.command).not.toHaveBeenCalled();
      expect(coordinator.isSettled()).toBe(true);
    });

    it('should keep the original due time when demand returns while pending', () => {
      const coordinator = create(30, 60);
      coordinator.register('living');
      clock.advanceTo(10);
      coordinator.deregister('living');
      clock.advanceTo(20);
      coordinator.register('office');
      expect(coordinator.snapshot().onDueAt).toBe(30);
      clock.advanceTo(30);
      expect(actions()).toEqual(['boiler:on']);
    });
  });

  describe('off-delay', () => {
    it('should command off once the delay passes with no demand', () => {
      const coordinator = create(30, 60);
      coordinator.register('living');
      clock.advanceTo(30);
      clock.advanceTo(40);
      coordinator.deregister('living');
      expect(coordinator.snapshot().offDueAt).toBe(100);

      clock.advanceTo(99);
      expect(actions()).toEqual(['boiler:on']);
      clock.advanceTo(100);
      expect(actions()).toEqual(['boiler:on', 'boiler:off']);
      expect(coordinator.isCommandedOn()).toBe(false);
    });

    it('should not schedule an off when the heater was never commanded on', () => {
      const coordinator = create(30, 60);
      coordinator.register('living');
      clock.advanceTo(5);
      coordinator.deregister('living');
      expect(coordinator.snapshot().offDueAt).toBeNull();
    });

    it('should keep the heater on while another zone still demands', () => {
      const coordinator = create(30, 60);
      coordinator.register('living');
      coordinator.register('office');
      clock.advanceTo(30);
      coordinator.deregister('living');
      expect(coordinator.snapshot().offDueAt).toBeNull();
      clock.advanceTo(500);
      expect(actions()).toEqual(['boiler:on']);
    });
  });

  describe('shared heater scenario', () => {
    it('should never turn the heater off when demand returns within the off-delay', () => {
      const coordinator = create(30, 60);

      coordinator.register('living');
      expect(coordinator.snapshot().onDueAt).toBe(30);

      clock.advanceTo(10);
      coordinator.register('office');
      expect(coordinator.snapshot().onDueAt).toBe(30);
      expect(commander.command).not.toHaveBeenCalled();

      clock.advanceTo(30);
      expect(actions()).toEqual(['boiler:on']);

      clock.advanceTo(40);
      coordinator.deregister('living');
      expect(coordinator.isCommandedOn()).toBe(true);

      clock.advanceTo(50);
      coordinator.deregister('office');
      expect(coordinator.snapshot().offDueAt).toBe(110);

      clock.advanceTo(90);
      coordinator.register('living');
      expect(coordinator.snapshot().offDueAt).toBeNull();

      clock.advanceTo(300);
      expect(actions()).toEqual(['boiler:on']);
      expect(coordinator.snapshot().demand).toEqual(['living']);
    });
  });

  describe('registration', () => {
    it('should be idempotent', () => {
      const coordinator = create(0, 0);
      coordinator.register('living');
      coordinator.register('living');
      expect(coordinator.snapshot().demand).toEqual(['living']);

      coordinator.deregister('living');
      coordinator.deregister('living');
      expect(actions()).toEqual(['boiler:on', 'boiler:off']);
    });

    it('should withdraw demand when a zone unsubscribes', () => {
      const coordinator = create(0, 60);
      coordinator.register('living');
      coordinator.unsubscribe('living');
      expect(coordinator.hasDemand('living')).toBe(false);
      expect(coordinator.subscriberCount()).toBe(1);
      expect(coordinator.snapshot().offDueAt).toBe(60);
    });
  });

  describe('heater hold', () => {
    let release: ReturnType<typeof vi.fn>;

    beforeEach(() => {
      release = vi.fn();
    });

    it('should keep the release of the last zone until the heater is off', () => {
      const coordinator = create(0, 60);
      coordinator.register('living');

      expect(coordinator.deregister('living', release)).toBe(true);
      expect(coordinator.snapshot().heldBy).toBe('living');

      clock.advanceTo(59);
      expect(release).not.toHaveBeenCalled();

      clock.advanceTo(60);
      expect(actions()).toEqual(['boiler:on', 'boiler:off']);
      expect(release).toHaveBeenCalledTimes(1);
      expect(coordinator.snapshot().heldBy).toBeNull();
    });

    it('should not hold while other zones still demand heat', () => {
      const coordinator = create(0, 60);
      coordinator.register('living');
      coordinator.register('office');
      expect(coordinator.deregister('living', release)).toBe(false);
      expect(coordinator.snapshot().heldBy).toBeNull();
    });

    it('should not hold when the heater goes off at once', () => {
      const coordinator = create(0, 0);
      coordinator.register('living');
      expect(coordinator.deregister('living', release)).toBe(false);
      expect(actions()).toEqual(['boiler:on', 'boiler:off']);
    });

    it('should not hold when the heater was never switched on', () => {
      const coordinator = create(30, 60);
      coordinator.register('living');
      expect(coordinator.deregister('living', release)).toBe(false);
    });

    it('should release the hold when another zone starts demand', () => {
      const coordinator = create(0, 60);
      coordinator.register('living');
      coordinator.deregister('living', release);

      coordinator.register('office');
      expect(release).toHaveBeenCalledTimes(1);
      expect(coordinator.snapshot().offDueAt).toBeNull();

      clock.advanceTo(200);
      expect(release).toHaveBeenCalledTimes(1);
    });

    it('should drop the hold without a call when the zone demands again', () => {
      const coordinator = create(0, 60);
      coordinator.register('living');
      coordinator.deregister('living', release);
      coordinator.register('living');

      clock.advanceTo(200);
      expect(release).not.toHaveBeenCalled();
      expect(coordinator.snapshot().heldBy).toBeNull();
    });

    it('should drop the hold when the zone unsubscribes', () => {
      const coordinator = create(0, 60);
      coordinator.register('living');
      coordinator.deregister('living', release);
      coordinator.unsubscribe('living');

      clock.advanceTo(60);
      expect(actions()).toEqual(['boiler:on', 'boiler:off']);
      expect(release).not.toHaveBeenCalled();
    });
  });

  describe('differing delays', () => {
    it('should use the maximum delays and warn', () => {
      const coordinator = createCentralHeaterCoordinator('boiler', {
        commander: commander,
        timerApi: clock.timerApi,
        timeSource: clock.now,
        logger: logger
      });
      coordinator.subscribe('living', { onDelaySec: 10, offDelaySec: 120 });
      coordinator.subscribe('office', { onDelaySec: 30, offDelaySec: 60 });

      expect(coordinator.snapshot().timing).toEqual({ onDelaySec: 30, offDelaySec: 120 });
      expect(logger.warning).toHaveBeenCalledWith(
        'Zones sharing boiler use different delays, using on 30s off 120s'
      );
    });

    it('should fall back to the remaining subscriber after one leaves', () => {
      const coordinator = createCentralHeaterCoordinator('boiler', {
        commander: commander,
        timerApi: clock.timerApi,
        timeSource: clock.now,
        logger: logger
      });
      coordinator.subscribe('living', { onDelaySec: 10, offDelaySec: 120 });
      coordinator.subscribe('office', { onDelaySec: 30, offDelaySec: 60 });
      coordinator.unsubscribe('office');
      expect(coordinator.snapshot().timing).toEqual({ onDelaySec: 10, offDelaySec: 120 });
    });
  });

  describe('dispose', () => {
    it('should cancel timers without commanding', () => {
      const coordinator = create(30, 60);
      coordinator.register('living');
      coordinator.dispose();
      clock.advanceTo(100);
      expect(commander.command).not.toHaveBeenCalled();
      expect(coordinator.isSettled()).toBe(true);
      expect(clock.pendingTimers()).toBe(0);
    });
  });

  describe('effectiveTiming', () => {
    it('should return the fallback without subscribers', () => {
      expect(effectiveTiming([], { onDelaySec: 5, offDelaySec: 7 })).toEqual({ onDelaySec: 5, offDelaySec: 7 });
    });
  });
});
