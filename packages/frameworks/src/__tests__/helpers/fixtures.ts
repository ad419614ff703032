/**
 * YAML fixture strings for framework document tests.
 */

export const VALID_MINIMAL_YAML = `
solo:
  version: '1.0'
`;

export const VALID_FULL_YAML = `
# templates never reach the registry
__template:
  version: ''
  module:
  setup_args: ''
  params: {}
  project: http://example.test/project
  docker_image:
    author: automlbenchmark
    image:
    tag:

baseline:
  version: 'latest'

baseline_enc:
  extends: baseline
  params:
    encode: true

Forest:
  version: '1.2.3'
  project: https://example.test/forest
  docker_image:
    image: frst
  params:
    n_estimators: 500

Booster:
  version: '0.4'
  setup_args: '--with-gpu'
  setup_cmd: make install
  docker_image:
    author: examplelab
    tag: nightly
  params:
    rounds: 50
    search:
      max_evals: 10
`;

export const YAML_WITH_CYCLE = `
alpha:
  extends: beta
  version: '1'
beta:
  extends: alpha
`;

export const YAML_WITH_UNKNOWN_PARENT = `
orphan:
  extends: nobody
  version: '1'
`;

export const INVALID_YAML_SYNTAX = `
solo:
  version: '1.0'
  params: [unclosed
`;

export const DUPLICATE_NAMES_YAML = `
solo:
  version: '1.0'
solo:
  version: '2.0'
`;

export const YAML_WITH_UNRESOLVED_TAG = `
solo:
  version: '1.0'
  params:
    kernel: !custom rbf
`;
