import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { RiverRunnerRequestDto } from './river-runner-request.dto';

async function errorsFor(body: Record<string, unknown>) {
  const errors = await validate(plainToInstance(RiverRunnerRequestDto, body));
  return errors.map((e) => ({
    property: e.property,
    constraints: Object.keys(e.constraints ?? {}).sort(),
  }));
}

describe('RiverRunnerRequestDto', () => {
  it('accepts a numeric lat/long', async () => {
    await expect(errorsFor({ lat: 0.01, long: 2.5 })).resolves.toEqual([]);
  });

  it('rejects lat/long sent as strings', async () => {
    await expect(errorsFor({ lat: '0.01', long: '2.5' })).resolves.toEqual([
      { property: 'lat', constraints: ['isNumber'] },
      { property: 'long', constraints: ['isNumber'] },
    ]);
  });

  it('rejects a latitude out of range', async () => {
    await expect(errorsFor({ lat: 91, long: 2.5 })).resolves.toEqual([
      { property: 'lat', constraints: ['isLatitude'] },
    ]);
  });

  it('accepts a numeric or string feature id', async () => {
    await expect(errorsFor({ id: 42 })).resolves.toEqual([]);
    await expect(errorsFor({ id: 'seg2' })).resolves.toEqual([]);
  });

  it('rejects an unknown sort direction', async () => {
    await expect(
      errorsFor({ id: 'seg2', sortDirection: 'sideways' }),
    ).resolves.toEqual([{ property: 'sortDirection', constraints: ['isIn'] }]);
  });
});
