/**
 * CLI commands index
 * Exports all command creators
 */

export { createDeployCommand, runDeploy } from './deploy.js';
export { createPlanCommand, runPlan } from './plan.js';
export { createConfigCommand } from './config.js';
export { createDoctorCommand, runDoctorChecks } from './doctor.js';
