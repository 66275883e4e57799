export { CycleGuard } from './cycle_guard';
