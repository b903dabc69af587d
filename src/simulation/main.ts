// src/simulation/main.ts

import { loadSnapshot } from '../config/snapshot';
import sampleSnapshot from './sampleSnapshot.json';
import { runPlanningSimulation } from './runPlanningSimulation';

const summary = runPlanningSimulation(loadSnapshot(sampleSnapshot), { year: 2026, month: 5 });
process.exitCode = summary.invariantsHold ? 0 : 1;
