/**
 * Services barrel export
 *
 * Service layer over the OpenShift CLI. These services run and classify
 * `oc` commands and give the CLI commands a typed API.
 */

// oc wrapper
export * from './cluster-service';

// Project deletion and convergence wait
export * from './deletion-waiter';

// Project creation and configuration
export * from './project-service';

// Connection secrets
export * from './secret-service';

// Model deployment
export * from './model-service';

// GPU usage
export * from './gpu-service';
