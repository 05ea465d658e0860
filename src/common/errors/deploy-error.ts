export class DeployError extends Error { }
