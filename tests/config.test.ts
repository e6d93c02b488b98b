import {
  DEFAULT_CONFIG,
  loadConfig,
  loadConfigWithInfo,
  mergeConfig,
  toVocabularies,
} from '../src/config';
import { DEFAULT_VOCABULARIES } from '../src/vocabularies';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';

describe('Config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'uiflow-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  describe('loadConfig', () => {
    it('should return default config when no config file exists', () => {
      const result = loadConfigWithInfo(tempDir);

      expect(result.config).toEqual(DEFAULT_CONFIG);
      expect(result.configPath).toBeNull();
    });

    it('should load JSON config file', () => {
      fs.writeFileSync(
        path.join(tempDir, 'uiflow.config.json'),
        JSON.stringify({ uiMethods: ['imageButton'], includeUnresolved: false })
      );

      const result = loadConfigWithInfo(tempDir);

      expect(result.configPath).toBe(path.join(tempDir, 'uiflow.config.json'));
      expect(result.config).toEqual({
        uiMethods: ['imageButton'],
        actionMethods: [],
        mutatingMethods: [],
        dsComponents: [],
        dsActions: [],
        ignore: [],
        includeUnresolved: false,
      });
    });

    it('should load .uiflowrc as JSON', () => {
      fs.writeFileSync(path.join(tempDir, '.uiflowrc'), JSON.stringify({ ignore: ['gen/**'] }));

      expect(loadConfig(tempDir).ignore).toEqual(['gen/**']);
    });

    it('should load design-system names', () => {
      fs.writeFileSync(
        path.join(tempDir, 'uiflow.config.json'),
        JSON.stringify({ dsComponents: ['Toggle'], dsActions: ['onSubmit'] })
      );

      const config = loadConfig(tempDir);
      expect(config.dsComponents).toEqual(['Toggle']);
      expect(config.dsActions).toEqual(['onSubmit']);
    });

    it('should load a CommonJS config file', () => {
      fs.writeFileSync(
        path.join(tempDir, 'uiflow.config.js'),
        "module.exports = { actionMethods: ['longPressed'] };\n"
      );

      expect(loadConfig(tempDir).actionMethods).toEqual(['longPressed']);
    });

    it('should prefer uiflow.config.js over the other file names', () => {
      fs.writeFileSync(
        path.join(tempDir, 'uiflow.config.js'),
        "module.exports = { mutatingMethods: ['reset'] };\n"
      );
      fs.writeFileSync(
        path.join(tempDir, 'uiflow.config.json'),
        JSON.stringify({ mutatingMethods: ['swap'] })
      );

      expect(loadConfigWithInfo(tempDir).configPath).toBe(path.join(tempDir, 'uiflow.config.js'));
      expect(loadConfig(tempDir).mutatingMethods).toEqual(['reset']);
    });

    it('should find a config file in a parent directory', () => {
      const nested = path.join(tempDir, 'src', 'panels');
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(tempDir, '.uiflowrc.json'), JSON.stringify({ uiMethods: ['knob'] }));

      expect(loadConfig(nested).uiMethods).toEqual(['knob']);
    });

    it('should start the search beside a file target', () => {
      const filePath = path.join(tempDir, 'panel.ts');
      fs.writeFileSync(filePath, '');
      fs.writeFileSync(path.join(tempDir, 'uiflow.config.json'), JSON.stringify({ uiMethods: ['knob'] }));

      expect(loadConfig(filePath).uiMethods).toEqual(['knob']);
    });

    it('should warn and fall back to defaults on invalid JSON', () => {
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
      fs.writeFileSync(path.join(tempDir, 'uiflow.config.json'), '{ not json');

      expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(warnSpy.mock.calls[0][0]).toBe(
        `Warning: Could not load config from ${path.join(tempDir, 'uiflow.config.json')}:`
      );
    });

    it('should reject options of the wrong type', () => {
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
      fs.writeFileSync(
        path.join(tempDir, 'uiflow.config.json'),
        JSON.stringify({ uiMethods: 'imageButton' })
      );

      expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);
      const error = warnSpy.mock.calls[0][1];
      expect(error).toBeInstanceOf(Error);
      expect(error instanceof Error && error.message).toBe(
        `Config option "uiMethods" in ${path.join(tempDir, 'uiflow.config.json')} must be an array of strings`
      );
    });

    it('should reject a non-boolean includeUnresolved', () => {
      jest.spyOn(console, 'warn').mockImplementation(() => {});
      fs.writeFileSync(
        path.join(tempDir, 'uiflow.config.json'),
        JSON.stringify({ includeUnresolved: 'no' })
      );

      expect(loadConfig(tempDir).includeUnresolved).toBe(true);
    });
  });

  describe('mergeConfig', () => {
    it('should append user lists to the defaults', () => {
      const merged = mergeConfig(
        { ...DEFAULT_CONFIG, uiMethods: ['knob'], ignore: ['gen/**'] },
        { uiMethods: ['dial'], ignore: ['vendor/**'] }
      );

      expect(merged.uiMethods).toEqual(['knob', 'dial']);
      expect(merged.ignore).toEqual(['gen/**', 'vendor/**']);
      expect(merged.includeUnresolved).toBe(true);
    });

    it('should let the user override includeUnresolved', () => {
      expect(mergeConfig(DEFAULT_CONFIG, { includeUnresolved: false }).includeUnresolved).toBe(false);
    });
  });

  describe('toVocabularies', () => {
    it('should add configured names to the built-in vocabularies', () => {
      const vocabularies = toVocabularies({
        uiMethods: ['knob'],
        actionMethods: ['turned'],
        mutatingMethods: ['reset'],
      });

      expect(vocabularies.uiMethods.has('knob')).toBe(true);
      expect(vocabularies.uiMethods.has('button')).toBe(true);
      expect(vocabularies.actionMethods.has('turned')).toBe(true);
      expect(vocabularies.mutatingMethods.has('reset')).toBe(true);
      expect(DEFAULT_VOCABULARIES.uiMethods.has('knob')).toBe(false);
    });

    it('should add configured design-system names', () => {
      const vocabularies = toVocabularies({ dsComponents: ['Toggle'], dsActions: ['onSubmit'] });

      expect(vocabularies.dsComponents.has('Toggle')).toBe(true);
      expect(vocabularies.dsComponents.has('Button')).toBe(true);
      expect(vocabularies.dsActions.has('onSubmit')).toBe(true);
    });
  });
});
