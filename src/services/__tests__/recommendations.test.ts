import { MemoryReviewRepository } from '../../repositories/memoryReviewRepository';
import { ErrorKind } from '../../utils/errors';
import { RecommendationService, pickUniform } from '../recommendations';
import { ReviewStore } from '../reviewStore';
import { WeatherLookup } from '../weather';

class FakeWeather implements WeatherLookup {
  readonly calls: string[] = [];

  constructor(private readonly temperatures: Record<string, number>) {}

  async currentTemperature(city: string): Promise<number | null> {
    this.calls.push(city);
    return city in this.temperatures ? this.temperatures[city] : null;
  }
}

describe('RecommendationService', () => {
  let weather: FakeWeather;

  beforeEach(() => {
    weather = new FakeWeather({ Boston: 40, Miami: 90, Chicago: 10, Seattle: 50 });
  });

  it('returns the band locations with the temperature', async () => {
    const service = new RecommendationService(weather);

    await expect(service.locationsFor('Boston')).resolves.toEqual({
      city: 'Boston',
      temperature: 40,
      unit: 'fahrenheit',
      locations: ['1369 Coffee House', 'Tatte'],
    });
  });

  it('trims the city before the lookup', async () => {
    const service = new RecommendationService(weather);

    await service.locationsFor('  Boston ');

    expect(weather.calls).toEqual(['Boston']);
  });

  it('returns the band snacks', async () => {
    const service = new RecommendationService(weather);

    const result = await service.snacksFor('Miami');

    expect(result.snacks).toEqual(['Frozen yogurt', 'Matcha soft serve', 'Ice cream sandwich', 'Watermelon slices']);
  });

  it('returns the band seasonal snack', async () => {
    const service = new RecommendationService(weather);

    const result = await service.seasonalFor('Seattle');

    expect(result).toEqual({
      city: 'Seattle',
      temperature: 50,
      unit: 'fahrenheit',
      seasonalSnacks: ['Pumpkin spice latte'],
    });
  });

  it('returns the current weather alone', async () => {
    const service = new RecommendationService(weather);

    await expect(service.currentWeather('Chicago')).resolves.toEqual({
      city: 'Chicago',
      temperature: 10,
      unit: 'fahrenheit',
    });
  });

  it.each([undefined, '', '   ', 42])('rejects city %p before any lookup', async city => {
    const service = new RecommendationService(weather);

    await expect(service.locationsFor(city)).rejects.toMatchObject({ kind: ErrorKind.INVALID_INPUT });
    expect(weather.calls).toEqual([]);
  });

  it('surfaces WEATHER_UNAVAILABLE for an unknown city and leaves reviews alone', async () => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const repository = new MemoryReviewRepository();
    const store = new ReviewStore(repository);
    await store.create('Almond croissant', 'Tatte', 4, false, null);
    const service = new RecommendationService(weather);

    await expect(service.locationsFor('Atlantis')).rejects.toMatchObject({
      kind: ErrorKind.WEATHER_UNAVAILABLE,
    });

    const reviews = await store.listReviews();
    expect(reviews).toHaveLength(1);
    expect(reviews[0].updatedAt).toEqual(reviews[0].createdAt);
    jest.restoreAllMocks();
  });

  describe('pairingFor', () => {
    it('pairs a snack with the band seasonal drink', async () => {
      const service = new RecommendationService(weather, () => 0);

      await expect(service.pairingFor('Chicago')).resolves.toEqual({
        city: 'Chicago',
        temperature: 10,
        unit: 'fahrenheit',
        snack: 'Tomato soup',
        drink: 'Peppermint hot chocolate',
      });
    });

    it('uses the random source to pick the snack', async () => {
      const picks: string[] = [];
      for (const value of [0, 0.25, 0.5, 0.99]) {
        const service = new RecommendationService(weather, () => value);
        picks.push((await service.pairingFor('Chicago')).snack);
      }

      expect(picks).toEqual(['Tomato soup', 'Grilled cheese', 'Chicken noodle soup', 'Baked mac and cheese']);
    });

    it('looks the weather up once', async () => {
      const service = new RecommendationService(weather, () => 0.5);

      const pairing = await service.pairingFor('Boston');

      expect(weather.calls).toEqual(['Boston']);
      expect(pairing.drink).toBe('Hot apple cider');
    });
  });
});

describe('pickUniform', () => {
  it('maps the unit interval evenly onto the list', () => {
    const items = ['a', 'b', 'c', 'd'];

    expect(items.map((_, i) => pickUniform(items, () => i / items.length))).toEqual(items);
  });

  it('stays inside the list when the source returns 1', () => {
    expect(pickUniform(['a', 'b'], () => 1)).toBe('b');
  });

  it('throws on an empty list', () => {
    expect(() => pickUniform([], () => 0)).toThrow('Cannot pick from an empty list');
  });
});
