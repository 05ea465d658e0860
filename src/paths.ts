export default class LocalPaths {
  static ENV_FILENAME = '.env';
  static PLAN_FILENAMES = ['deploy.yml', 'deploy.yaml'];
}
