import { describe, it, expect } from 'vitest';
import { projectAnnotations, projectLabels, ProjectService, type ProjectSettings } from './project-service';
import { ClusterService } from './cluster-service';
import { ErrorCode } from '../utils/errors';
import { createFakeRunner, NOT_FOUND } from '../testing/fake-runner';

const settings: ProjectSettings = {
  projectName: 'demo',
  displayName: 'Demo Project',
  requester: 'someone@redhat.com',
  labels: {
    modelmeshEnabled: false,
    dashboardEnabled: true,
    podSecurityAudit: 'baseline',
    podSecurityAuditVersion: 'latest',
    podSecurityWarn: 'restricted',
    podSecurityWarnVersion: 'v1.29',
  },
};

describe('projectLabels', () => {
  it('renders every label as a string', () => {
    expect(projectLabels('demo', settings.labels)).toEqual({
      'kubernetes.io/metadata.name': 'demo',
      'modelmesh-enabled': 'false',
      'opendatahub.io/dashboard': 'true',
      'pod-security.kubernetes.io/audit': 'baseline',
      'pod-security.kubernetes.io/audit-version': 'latest',
      'pod-security.kubernetes.io/warn': 'restricted',
      'pod-security.kubernetes.io/warn-version': 'v1.29',
    });
  });
});

describe('projectAnnotations', () => {
  it('sets display name, empty description and requester', () => {
    expect(projectAnnotations('Demo Project', 'someone@redhat.com')).toEqual({
      'openshift.io/display-name': 'Demo Project',
      'openshift.io/description': '',
      'openshift.io/requester': 'someone@redhat.com',
    });
  });
});

describe('ProjectService.setup', () => {
  it('creates a missing project and configures it', async () => {
    const fake = createFakeRunner({
      'oc get project demo': NOT_FOUND('projects.project.openshift.io', 'demo'),
      'oc describe project demo': { stdout: 'Name:\tdemo\n' },
    });
    const created: string[] = [];

    const result = await new ProjectService(new ClusterService({ runner: fake.runner }), settings).setup({
      onCreated: (name) => created.push(name),
    });

    expect(result).toEqual({
      success: true,
      data: {
        created: true,
        labelsApplied: true,
        annotationsApplied: true,
        description: 'Name:\tdemo\n',
        warnings: [],
      },
    });
    expect(created).toEqual(['demo']);
    expect(fake.calls.map(call => call.args[0])).toEqual(['get', 'new-project', 'label', 'annotate', 'describe']);
  });

  it('switches to an existing project instead of creating it', async () => {
    const fake = createFakeRunner();
    const existing: string[] = [];

    const result = await new ProjectService(new ClusterService({ runner: fake.runner }), settings).setup({
      onExisting: (name) => existing.push(name),
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.created).toBe(false);
    }
    expect(existing).toEqual(['demo']);
    expect(fake.lines()).toContain('oc project demo');
    expect(fake.lines()).not.toContain('oc new-project demo --display-name=Demo Project');
  });

  it('keeps going when labelling fails', async () => {
    const fake = createFakeRunner({
      [`oc label namespace demo ${Object.entries(projectLabels('demo', settings.labels)).map(([k, v]) => `${k}=${v}`).join(' ')} --overwrite`]: {
        exitCode: 1,
        stderr: 'forbidden',
      },
    });

    const result = await new ProjectService(new ClusterService({ runner: fake.runner }), settings).setup();

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.labelsApplied).toBe(false);
      expect(result.data.annotationsApplied).toBe(true);
      expect(result.data.warnings.map(warning => warning.message)).toEqual(['Failed to label namespace demo']);
    }
  });

  it('fails when the project cannot be created', async () => {
    const fake = createFakeRunner({
      'oc get project demo': NOT_FOUND('projects.project.openshift.io', 'demo'),
      'oc new-project demo --display-name=Demo Project': { exitCode: 1, stderr: 'project request forbidden' },
    });

    const result = await new ProjectService(new ClusterService({ runner: fake.runner }), settings).setup();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Failed to create project demo');
      expect(result.error.output).toBe('project request forbidden');
    }
    expect(fake.calls).toHaveLength(2);
  });

  it('fails when the existence check errors', async () => {
    const fake = createFakeRunner({ 'oc get project demo': { exitCode: 1, stderr: 'Unauthorized' } });

    const result = await new ProjectService(new ClusterService({ runner: fake.runner }), settings).setup();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.CHECK_FAILED);
    }
  });
});
