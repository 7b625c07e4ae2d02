import { beforeEach, describe, it, expect } from 'vitest';
import { ConsoleService, type ConsoleEntry } from './ConsoleService';

describe('ConsoleService', () => {
  beforeEach(() => {
    ConsoleService.setMinLevel('info');
    ConsoleService.clear();
  });

  it('records entries with level and source', () => {
    ConsoleService.warn('No UNP profile named "UNP999"', 'catalog');
    const [entry] = ConsoleService.getEntries();
    expect(entry.id).toBe(1);
    expect(entry.level).toBe('warn');
    expect(entry.source).toBe('catalog');
    expect(entry.content).toBe('No UNP profile named "UNP999"');
  });

  it('leaves out the source when none is given', () => {
    ConsoleService.log('plain');
    expect(ConsoleService.getEntries()[0]).not.toHaveProperty('source');
    expect(ConsoleService.getEntries()[0].level).toBe('info');
  });

  it('drops entries below the minimum level', () => {
    ConsoleService.debug('hidden');
    expect(ConsoleService.getEntries()).toHaveLength(0);

    ConsoleService.setMinLevel('debug');
    ConsoleService.debug('shown');
    expect(ConsoleService.getEntries()).toHaveLength(1);

    ConsoleService.setMinLevel('error');
    ConsoleService.warn('hidden');
    ConsoleService.error('shown');
    expect(ConsoleService.getEntries().map(e => e.content)).toEqual(['shown', 'shown']);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const received: ConsoleEntry[][] = [];
    const unsubscribe = ConsoleService.subscribe(entries => received.push(entries));

    ConsoleService.info('first');
    unsubscribe();
    ConsoleService.info('second');

    expect(received).toHaveLength(1);
    expect(received[0].map(e => e.content)).toEqual(['first']);
  });

  it('keeps the last 400 entries once 500 are exceeded', () => {
    for (let i = 0; i <= 500; i++) {
      ConsoleService.info(`message ${i}`);
    }
    const entries = ConsoleService.getEntries();
    expect(entries).toHaveLength(400);
    expect(entries[0].content).toBe('message 101');
    expect(entries[399].content).toBe('message 500');
  });

  it('restarts ids after clearing', () => {
    ConsoleService.info('a');
    ConsoleService.clear();
    ConsoleService.info('b');
    expect(ConsoleService.getEntries()[0].id).toBe(1);
  });
});
