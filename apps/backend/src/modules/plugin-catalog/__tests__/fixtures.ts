import type { IPluginDescriptor } from '@plugcat/types';

export const DOCKER_STEP_YAML = `version: 1
kind: plugin
type: step
name: docker
spec:
  description: Build and push a Docker image
  inputs:
    repo:
      type: string
      required: true
  image: plugins/docker
`;

export const DOCKER_STEP_YAML_V2 = `version: 1
kind: plugin
type: step
name: docker
spec:
  description: Build and push a Docker image to any registry
  inputs:
    repo:
      type: string
      required: true
  image: plugins/docker
`;

export const SLACK_STEP_YAML = `version: 1
kind: plugin
type: step
name: slack
spec:
  description: Send a Slack notification
  image: plugins/slack
`;

export const DEPLOY_STAGE_YAML = `version: 1
kind: plugin
type: stage
name: deploy
spec:
  description: Rolling deployment stage
  steps:
    - name: rollout
`;

export const PIPELINE_YAML = `version: 1
kind: pipeline
name: build
spec:
  stages: []
`;

export const BROKEN_YAML = 'kind: plugin\ntype: step\nname: [broken\n';

export const DOCKER_LOGO = '<svg xmlns="http://www.w3.org/2000/svg"><rect width="1" height="1"/></svg>';

export function descriptor(overrides: Partial<IPluginDescriptor> = {}): IPluginDescriptor {
    return {
        uid: 'docker',
        type: 'step',
        description: 'Build and push a Docker image',
        spec: DOCKER_STEP_YAML,
        logo: '',
        ...overrides
    };
}
