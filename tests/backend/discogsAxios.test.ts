import { RequestThrottle } from '../../src/backend/utils/discogsAxios';

describe('RequestThrottle', () => {
  let clock: number;
  let waits: number[];

  const createThrottle = (minIntervalMs: number) =>
    new RequestThrottle(
      minIntervalMs,
      () => clock,
      async ms => {
        waits.push(ms);
        clock += ms;
      }
    );

  beforeEach(() => {
    clock = 10000;
    waits = [];
  });

  it('should let the first request through immediately', async () => {
    const throttle = createThrottle(1000);

    await throttle.acquire();

    expect(waits).toEqual([]);
    expect(throttle.getLastRequestAt()).toBe(10000);
  });

  it('should wait out the rest of the interval', async () => {
    const throttle = createThrottle(1000);

    await throttle.acquire();
    clock += 300;
    await throttle.acquire();

    expect(waits).toEqual([700]);
    expect(throttle.getLastRequestAt()).toBe(11000);
  });

  it('should not wait once the interval has passed', async () => {
    const throttle = createThrottle(1000);

    await throttle.acquire();
    clock += 1000;
    await throttle.acquire();

    expect(waits).toEqual([]);
  });

  it('should never wait with a zero interval', async () => {
    const throttle = createThrottle(0);

    await throttle.acquire();
    await throttle.acquire();

    expect(waits).toEqual([]);
  });

  it('should report no request before the first acquire', () => {
    expect(createThrottle(1000).getLastRequestAt()).toBeNull();
  });
});
