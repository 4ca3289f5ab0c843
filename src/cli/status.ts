/**
 * CLI: Status
 *
 * Usage:
 *   npm run status
 *   npm run status -- <TAG>              one subject with its rivals
 *   npm run status -- <TAG> --vs <TAG>   head-to-head record
 *
 * Reads the state store directly; does not touch the battle API.
 */

import dotenv from 'dotenv';
import { loadMonitorConfig, openStateStore } from '../config';
import { normalizeTag } from '../services/BattleNormalizer';
import { formatHeadToHead, formatRivalsList, formatStats } from '../services/EventFormatter';
import { headToHead, listRivals } from '../services/RivalTracker';
import type { SubjectState } from '../types';

dotenv.config();

function printSubject(state: SubjectState, withRivals: boolean): void {
  console.log(formatStats(state.subject, state.aggregate));
  if (withRivals) {
    console.log('');
    console.log(formatRivalsList(listRivals(state.aggregate), state.subject.name));
  }
  console.log('');
}

function main(): number {
  const args = process.argv.slice(2);
  const vsIndex = args.indexOf('--vs');
  const opponent = vsIndex >= 0 ? args[vsIndex + 1] : undefined;
  const tagArg = args.find((arg, i) => !arg.startsWith('--') && (vsIndex < 0 || i !== vsIndex + 1));

  const config = loadMonitorConfig();
  const store = openStateStore(config);

  try {
    if (!tagArg) {
      const states = [...store.loadAll().values()];
      if (states.length === 0) {
        console.log('No subjects monitored.');
        return 0;
      }
      for (const state of states) {
        printSubject(state, false);
      }
      return 0;
    }

    const tag = normalizeTag(tagArg);
    const state = store.get(tag);
    if (!state) {
      console.error(`#${tag} is not monitored`);
      return 1;
    }

    if (opponent) {
      const entry = headToHead(state.aggregate, opponent);
      if (!entry) {
        console.error(`#${tag} has never played #${normalizeTag(opponent)}`);
        return 1;
      }
      console.log(formatHeadToHead(entry));
      return 0;
    }

    printSubject(state, true);
    return 0;
  } finally {
    store.close();
  }
}

process.exit(main());
