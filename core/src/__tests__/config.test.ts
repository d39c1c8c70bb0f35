import { configFromEnv, DEFAULT_FUSION_WEIGHTS, parseWeights, resolveConfig } from '../config';
import { ConfigError } from '../errors';

describe('Configuration', () => {
  describe('resolveConfig', () => {
    it('should apply defaults', () => {
      expect(resolveConfig()).toEqual({
        seed: 'veriframe-v1',
        stageDelayMs: 0,
        timeoutMs: null,
        staleAfterMs: 300000,
        weights: DEFAULT_FUSION_WEIGHTS,
        baseFakeRate: 0.35,
        demoKeywords: ['fake', 'deep', 'manipulated', 'synthetic', 'demo']
      });
    });

    it('should reject weights that do not sum to 1', () => {
      expect(() => resolveConfig({ weights: { video: 0.5, audio: 0.5, lipsync: 0.5 } })).toThrow(
        'Invalid analysis configuration - weights: fusion weights must sum to 1'
      );
    });

    it('should reject negative weights', () => {
      expect(() => resolveConfig({ weights: { video: 1.2, audio: -0.2, lipsync: 0 } })).toThrow(ConfigError);
    });

    it('should reject a negative stage delay', () => {
      expect(() => resolveConfig({ stageDelayMs: -1 })).toThrow(ConfigError);
    });
  });

  describe('parseWeights', () => {
    it('should read video, audio and lip-sync weights', () => {
      expect(parseWeights('0.6, 0.3, 0.1')).toEqual({ video: 0.6, audio: 0.3, lipsync: 0.1 });
    });

    it('should reject malformed input', () => {
      expect(() => parseWeights('0.5,0.5')).toThrow(ConfigError);
      expect(() => parseWeights('a,b,c')).toThrow('Weights must be three numbers "video,audio,lipsync", got "a,b,c"');
    });
  });

  describe('configFromEnv', () => {
    it('should read VERIFRAME_* variables', () => {
      const config = configFromEnv({
        VERIFRAME_SEED: 'env-seed',
        VERIFRAME_STAGE_DELAY_MS: '25',
        VERIFRAME_TIMEOUT_MS: '60000',
        VERIFRAME_FAKE_RATE: '0.1',
        VERIFRAME_STALE_AFTER_MS: '90000',
        VERIFRAME_WEIGHTS: '0.4,0.4,0.2'
      });

      expect(config.seed).toBe('env-seed');
      expect(config.stageDelayMs).toBe(25);
      expect(config.timeoutMs).toBe(60000);
      expect(config.baseFakeRate).toBe(0.1);
      expect(config.staleAfterMs).toBe(90000);
      expect(config.weights).toEqual({ video: 0.4, audio: 0.4, lipsync: 0.2 });
    });

    it('should let explicit overrides win', () => {
      const config = configFromEnv({ VERIFRAME_SEED: 'env-seed' }, { seed: 'flag-seed' });

      expect(config.seed).toBe('flag-seed');
    });

    it('should fail on values that are set but invalid', () => {
      expect(() => configFromEnv({ VERIFRAME_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
    });

    it('should ignore empty variables', () => {
      expect(configFromEnv({ VERIFRAME_STAGE_DELAY_MS: '' }).stageDelayMs).toBe(0);
    });
  });
});
