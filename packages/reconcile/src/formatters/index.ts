export {
  summarizePlan,
  isEmptyPlan,
  describeAccount,
  formatPlan,
} from './plan-formatter.js';
