import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  parseSimpleYaml,
  normalizeConfig,
  generateDefaultConfig,
  loadConfigFile,
  findConfig,
  writeConfigFile,
  CONFIG_FILES,
} from './config.js';

describe('parseSimpleYaml', () => {
  it('parses empty content', () => {
    expect(parseSimpleYaml('')).toEqual({});
  });

  it('ignores comments', () => {
    const yaml = `
# This is a comment
# Another comment
`;
    expect(parseSimpleYaml(yaml)).toEqual({});
  });

  it('parses a threshold', () => {
    expect(parseSimpleYaml('threshold: 0,2,4,4').threshold).toBe('0,2,4,4');
    expect(parseSimpleYaml('threshold: "0,2,4,4"').threshold).toBe('0,2,4,4');
  });

  it('parses a bracketed threshold', () => {
    expect(parseSimpleYaml('threshold: [0, 2, 4, 4]').threshold).toBe('0, 2, 4, 4');
  });

  it('parses include and exclude arrays', () => {
    const yaml = `
include:
  - "src/**/*.css"
  - 'styles/*.css'
exclude:
  - "**/vendor/**"
`;
    const result = parseSimpleYaml(yaml);
    expect(result.include).toEqual(['src/**/*.css', 'styles/*.css']);
    expect(result.exclude).toEqual(['**/vendor/**']);
  });

  it('parses a known format', () => {
    expect(parseSimpleYaml('format: json').format).toBe('json');
  });

  it('drops an unknown format', () => {
    expect(parseSimpleYaml('format: xml')).toEqual({});
  });

  it('parses a complete config', () => {
    const yaml = `
# Specificity config
threshold: 0,1,2,2
format: text
include:
  - "**/*.css"
exclude:
  - "**/node_modules/**"
`;
    expect(parseSimpleYaml(yaml)).toEqual({
      threshold: '0,1,2,2',
      format: 'text',
      include: ['**/*.css'],
      exclude: ['**/node_modules/**'],
    });
  });
});

describe('normalizeConfig', () => {
  it('keeps known keys with the right types', () => {
    expect(
      normalizeConfig({ include: ['a.css'], exclude: [], threshold: [0, 1, 2, 2], format: 'json' })
    ).toEqual({ include: ['a.css'], exclude: [], threshold: [0, 1, 2, 2], format: 'json' });
  });

  it('drops unknown keys and wrong types', () => {
    expect(normalizeConfig({ include: 'a.css', threshold: true, format: 'html', maxScore: 10 })).toEqual({});
  });

  it('returns an empty config for non-objects', () => {
    expect(normalizeConfig(null)).toEqual({});
    expect(normalizeConfig('0,1,3,3')).toEqual({});
  });
});

describe('generateDefaultConfig', () => {
  it('generates valid JSON', () => {
    const parsed: unknown = JSON.parse(generateDefaultConfig());
    expect(parsed).toEqual({
      include: ['**/*.css'],
      exclude: ['**/node_modules/**', '**/dist/**', '**/vendor/**'],
      threshold: '0,1,3,3',
      format: 'text',
    });
  });
});

describe('CONFIG_FILES', () => {
  it('includes the supported file names', () => {
    expect(CONFIG_FILES).toContain('.specificityrc');
    expect(CONFIG_FILES).toContain('.specificityrc.json');
    expect(CONFIG_FILES).toContain('specificity.config.json');
    expect(CONFIG_FILES).toContain('.specificityrc.yaml');
    expect(CONFIG_FILES).toContain('.specificityrc.yml');
  });
});

describe('config file operations', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'specificity-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('loadConfigFile', () => {
    it('loads a JSON config', async () => {
      const configPath = path.join(tempDir, '.specificityrc.json');
      await fs.writeFile(configPath, JSON.stringify({ threshold: '0,0,3,3', format: 'json' }));

      expect(await loadConfigFile(configPath)).toEqual({ threshold: '0,0,3,3', format: 'json' });
    });

    it('loads an extensionless config as JSON', async () => {
      const configPath = path.join(tempDir, '.specificityrc');
      await fs.writeFile(configPath, JSON.stringify({ exclude: ['legacy/**'] }));

      expect(await loadConfigFile(configPath)).toEqual({ exclude: ['legacy/**'] });
    });

    it('loads a YAML config', async () => {
      const configPath = path.join(tempDir, '.specificityrc.yaml');
      await fs.writeFile(configPath, 'threshold: 0,1,4,4\nformat: json');

      expect(await loadConfigFile(configPath)).toEqual({ threshold: '0,1,4,4', format: 'json' });
    });

    it('rejects invalid JSON', async () => {
      const configPath = path.join(tempDir, '.specificityrc.json');
      await fs.writeFile(configPath, '{ threshold: ');

      await expect(loadConfigFile(configPath)).rejects.toThrow(SyntaxError);
    });
  });

  describe('findConfig', () => {
    it('finds a config in the directory', async () => {
      await fs.writeFile(path.join(tempDir, 'specificity.config.json'), JSON.stringify({ threshold: '0,2,0,0' }));

      expect(await findConfig(tempDir)).toEqual({ threshold: '0,2,0,0' });
    });

    it('finds a config in a parent directory', async () => {
      const nested = path.join(tempDir, 'a', 'b');
      await fs.mkdir(nested, { recursive: true });
      await fs.writeFile(path.join(tempDir, '.specificityrc.yml'), 'format: json');

      expect(await findConfig(nested)).toEqual({ format: 'json' });
    });

    it('prefers the first name in CONFIG_FILES', async () => {
      await fs.writeFile(path.join(tempDir, '.specificityrc'), JSON.stringify({ format: 'json' }));
      await fs.writeFile(path.join(tempDir, '.specificityrc.yaml'), 'format: text');

      expect(await findConfig(tempDir)).toEqual({ format: 'json' });
    });
  });

  describe('writeConfigFile', () => {
    it('writes the default config', async () => {
      const configPath = await writeConfigFile(tempDir);

      expect(configPath).toBe(path.join(tempDir, '.specificityrc.json'));
      expect(await loadConfigFile(configPath)).toEqual({
        include: ['**/*.css'],
        exclude: ['**/node_modules/**', '**/dist/**', '**/vendor/**'],
        threshold: '0,1,3,3',
        format: 'text',
      });
    });

    it('uses a custom file name', async () => {
      const configPath = await writeConfigFile(tempDir, 'specificity.config.json');
      expect(path.basename(configPath)).toBe('specificity.config.json');
    });
  });
});
