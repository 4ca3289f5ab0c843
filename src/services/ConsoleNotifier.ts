import type { MonitorEventMap, MonitorEventName } from '../types';
import {
  formatArenaChanged,
  formatDiscontinuity,
  formatNewBattle,
  formatRivalPromoted,
  formatStoreFailing,
  formatSubjectFailing,
} from './EventFormatter';
import { Logger } from './Logger';

export interface MonitorEventSource {
  on<K extends MonitorEventName>(event: K, listener: (payload: MonitorEventMap[K]) => void): unknown;
  off<K extends MonitorEventName>(event: K, listener: (payload: MonitorEventMap[K]) => void): unknown;
}

type Writer = (text: string, severity: 'info' | 'warn' | 'error') => void;

const logger = new Logger('Notifier');

function logWriter(text: string, severity: 'info' | 'warn' | 'error'): void {
  if (severity === 'error') logger.error(text);
  else if (severity === 'warn') logger.warn(text);
  else logger.info(text);
}

/**
 * Default notification transport: renders each event to text and hands it
 * to a writer (the log, unless one is given).
 */
export class ConsoleNotifier {
  private write: Writer;
  private detachers: Array<() => void> = [];

  constructor(write: Writer = logWriter) {
    this.write = write;
  }

  attach(source: MonitorEventSource): void {
    this.listen(source, 'newBattle', (e) => this.write(`\n${formatNewBattle(e)}`, 'info'));
    this.listen(source, 'rivalPromoted', (e) => this.write(formatRivalPromoted(e), 'info'));
    this.listen(source, 'arenaChanged', (e) => this.write(formatArenaChanged(e), 'info'));
    this.listen(source, 'logDiscontinuity', (e) => this.write(formatDiscontinuity(e), 'warn'));
    this.listen(source, 'subjectFailing', (e) => this.write(formatSubjectFailing(e), 'warn'));
    this.listen(source, 'storeFailing', (e) => this.write(formatStoreFailing(e), 'error'));
  }

  detach(): void {
    for (const detach of this.detachers.splice(0)) {
      detach();
    }
  }

  private listen<K extends MonitorEventName>(
    source: MonitorEventSource,
    event: K,
    listener: (payload: MonitorEventMap[K]) => void,
  ): void {
    source.on(event, listener);
    this.detachers.push(() => source.off(event, listener));
  }
}
