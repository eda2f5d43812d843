import * as path from 'path';
import { loadJournalConfig } from './journal.config';

describe('loadJournalConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = loadJournalConfig({});

    expect(config).toEqual({
      dataFile: path.resolve('journal_data.json'),
      imageDir: path.resolve('trade_images'),
      port: 3000,
    });
  });

  it('should read paths and port from the environment', () => {
    const config = loadJournalConfig({
      JOURNAL_DATA_FILE: '/var/lib/journal/trades.json',
      JOURNAL_IMAGE_DIR: '/var/lib/journal/images',
      PORT: '8080',
    });

    expect(config.dataFile).toBe('/var/lib/journal/trades.json');
    expect(config.imageDir).toBe('/var/lib/journal/images');
    expect(config.port).toBe(8080);
  });

  it('should treat blank values as unset', () => {
    const config = loadJournalConfig({ JOURNAL_DATA_FILE: '  ', PORT: '' });

    expect(config.dataFile).toBe(path.resolve('journal_data.json'));
    expect(config.port).toBe(3000);
  });

  it('should throw error for a non-numeric port', () => {
    expect(() => loadJournalConfig({ PORT: 'http' })).toThrow('PORT must be a positive integer, got "http"');
  });

  it('should throw error for a zero port', () => {
    expect(() => loadJournalConfig({ PORT: '0' })).toThrow('PORT must be a positive integer');
  });
});
