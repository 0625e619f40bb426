/**
 * Project Service
 *
 * Creates the serving project, or brings an existing one back in line with
 * the configured labels and annotations. Safe to run repeatedly.
 */

import type { ClusterService } from './cluster-service';
import { ok, err, type Result } from '../types';
import type { ClusterError } from '../utils/errors';
import type { ProjectLabelSettings } from '../schemas/config.schema';
import { DASHBOARD_LABEL } from '../constants';

export interface ProjectSettings {
  projectName: string;
  displayName: string;
  requester: string;
  labels: ProjectLabelSettings;
}

export interface ProjectSetupReport {
  created: boolean;
  labelsApplied: boolean;
  annotationsApplied: boolean;
  /** `oc describe project` output, when it could be fetched */
  description?: string;
  /** Non-fatal failures, in the order they happened */
  warnings: ClusterError[];
}

export interface ProjectReporter {
  onStep?(message: string): void;
  onExisting?(name: string): void;
  onCreated?(name: string): void;
  onWarning?(error: ClusterError): void;
}

export function projectLabels(name: string, labels: ProjectLabelSettings): Record<string, string> {
  return {
    'kubernetes.io/metadata.name': name,
    'modelmesh-enabled': String(labels.modelmeshEnabled),
    [DASHBOARD_LABEL]: String(labels.dashboardEnabled),
    'pod-security.kubernetes.io/audit': labels.podSecurityAudit,
    'pod-security.kubernetes.io/audit-version': labels.podSecurityAuditVersion,
    'pod-security.kubernetes.io/warn': labels.podSecurityWarn,
    'pod-security.kubernetes.io/warn-version': labels.podSecurityWarnVersion,
  };
}

export function projectAnnotations(displayName: string, requester: string): Record<string, string> {
  return {
    'openshift.io/display-name': displayName,
    'openshift.io/description': '',
    'openshift.io/requester': requester,
  };
}

/**
 * Project Service - project creation and configuration
 */
export class ProjectService {
  constructor(
    private readonly cluster: ClusterService,
    private readonly settings: ProjectSettings
  ) {}

  async setup(reporter: ProjectReporter = {}): Promise<Result<ProjectSetupReport, ClusterError>> {
    const { projectName, displayName, requester, labels } = this.settings;
    const report: ProjectSetupReport = {
      created: false,
      labelsApplied: false,
      annotationsApplied: false,
      warnings: [],
    };
    const warn = (error: ClusterError) => {
      report.warnings.push(error);
      reporter.onWarning?.(error);
    };

    reporter.onStep?.(`Checking if project ${projectName} exists...`);
    const presence = await this.cluster.getProject(projectName);
    if (!presence.success) {
      return presence;
    }

    if (presence.data === 'present') {
      reporter.onExisting?.(projectName);
      const switched = await this.cluster.switchProject(projectName);
      if (!switched.success) {
        warn(switched.error);
      }
    } else {
      reporter.onStep?.(`Creating OpenShift project: ${projectName}`);
      const created = await this.cluster.newProject(projectName, displayName);
      if (!created.success) {
        return err(created.error);
      }
      report.created = true;
      reporter.onCreated?.(projectName);
    }

    reporter.onStep?.('Applying labels to project...');
    const labelled = await this.cluster.labelNamespace(projectName, projectLabels(projectName, labels));
    if (labelled.success) {
      report.labelsApplied = true;
    } else {
      warn(labelled.error);
    }

    reporter.onStep?.('Applying annotations to project...');
    const annotated = await this.cluster.annotateNamespace(projectName, projectAnnotations(displayName, requester));
    if (annotated.success) {
      report.annotationsApplied = true;
    } else {
      warn(annotated.error);
    }

    reporter.onStep?.('Verifying project configuration...');
    const described = await this.cluster.describeProject(projectName);
    if (described.success) {
      report.description = described.data;
    } else {
      warn(described.error);
    }

    return ok(report);
  }
}

/**
 * Factory function to create a ProjectService
 */
export function createProjectService(
  cluster: ClusterService,
  settings: ProjectSettings
): ProjectService {
  return new ProjectService(cluster, settings);
}
