export { TransientHostError } from './transient-host.error';
export { NotFoundError } from './not-found.error';
export { RemoteDependencyError } from './remote-dependency.error';
export { ValidationError } from './validation.error';
export { ActivityTimeoutError } from './activity-timeout.error';
