/**
 * Unit Tests: Weighted Selector
 */

import { WeightedSelector } from '../../src/orchestration/weightedSelector';
import { SeededRandom } from '../../src/orchestration/random';
import { ConfigurationError } from '../../src/infra/validation';
import { EndpointName } from '../../src/domain/types';
import { SequenceRandom } from '../helpers/sequenceRandom';

describe('WeightedSelector', () => {
  describe('choose', () => {
    it('should map draws onto cumulative weights', () => {
      const weights = { get_root: 1, get_list: 3 };

      // total 4: [0, 1) -> get_root, [1, 4) -> get_list
      expect(new WeightedSelector(weights, new SequenceRandom([0.2])).choose()).toBe('get_root');
      expect(new WeightedSelector(weights, new SequenceRandom([0.25])).choose()).toBe('get_list');
      expect(new WeightedSelector(weights, new SequenceRandom([0.999])).choose()).toBe('get_list');
    });

    it('should order entries by endpoint, not by key order', () => {
      const selector = new WeightedSelector({ get_list: 3, get_root: 1 }, new SequenceRandom([0.2]));
      expect(selector.choose()).toBe('get_root');
    });

    it('should never return a zero-weight endpoint', () => {
      const selector = new WeightedSelector({ get_root: 0, get_one: 1, bogus: 0 }, new SeededRandom(5));
      for (let i = 0; i < 1000; i++) {
        expect(selector.choose()).toBe('get_one');
      }
    });

    it('should draw one value per call', () => {
      const random = new SequenceRandom([0.1, 0.9]);
      const selector = new WeightedSelector({ get_root: 1, bogus: 1 }, random);

      expect(selector.choose()).toBe('get_root');
      expect(selector.choose()).toBe('bogus');
      expect(random.calls).toBe(2);
    });

    it('should be reproducible with the same seed', () => {
      const weights = { get_root: 10, get_list: 40, get_one: 30, post_order: 20 };
      const a = new WeightedSelector(weights, new SeededRandom(11));
      const b = new WeightedSelector(weights, new SeededRandom(11));

      const first = Array.from({ length: 50 }, () => a.choose());
      const second = Array.from({ length: 50 }, () => b.choose());

      expect(first).toEqual(second);
    });

    it('should converge to weight / sum', () => {
      const weights: Partial<Record<EndpointName, number>> = {
        get_root: 10,
        get_list: 40,
        get_one: 30,
        post_order: 20,
      };
      const selector = new WeightedSelector(weights, new SeededRandom(12345));
      const draws = 20000;
      const counts = new Map<EndpointName, number>();

      for (let i = 0; i < draws; i++) {
        const name = selector.choose();
        counts.set(name, (counts.get(name) ?? 0) + 1);
      }

      const names: EndpointName[] = ['get_root', 'get_list', 'get_one', 'post_order'];
      for (const name of names) {
        const expected = (weights[name] ?? 0) / 100;
        const observed = (counts.get(name) ?? 0) / draws;
        expect(Math.abs(observed - expected)).toBeLessThan(0.02);
      }
      expect(counts.has('bogus')).toBe(false);
    });
  });

  describe('probability', () => {
    it('should report weight / sum', () => {
      const selector = new WeightedSelector({ get_root: 1, get_list: 3 }, new SeededRandom(1));

      expect(selector.probability('get_root')).toBe(0.25);
      expect(selector.probability('get_list')).toBe(0.75);
      expect(selector.probability('bogus')).toBe(0);
    });

    it('should list only positive-weight candidates', () => {
      const selector = new WeightedSelector({ bogus: 2, get_root: 0, get_one: 1 }, new SeededRandom(1));
      expect(selector.getCandidates()).toEqual(['get_one', 'bogus']);
    });
  });

  describe('validation', () => {
    it('should reject empty weights', () => {
      expect(() => new WeightedSelector({}, new SeededRandom(1))).toThrow(ConfigurationError);
      expect(() => new WeightedSelector({}, new SeededRandom(1))).toThrow(
        'Invalid endpoint weights: weights: Weights must contain at least one endpoint'
      );
    });

    it('should reject negative weights', () => {
      expect(() => new WeightedSelector({ get_root: -1, get_list: 2 }, new SeededRandom(1))).toThrow(
        'Invalid endpoint weights: weights.get_root: Weight must be a non-negative number'
      );
    });

    it('should reject weights that sum to zero', () => {
      expect(() => new WeightedSelector({ get_root: 0, bogus: 0 }, new SeededRandom(1))).toThrow(
        'Invalid endpoint weights: weights: Weights must sum to a positive number'
      );
    });
  });
});
