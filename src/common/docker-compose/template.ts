export interface DockerService {
  labels?: string[] | { [key: string]: string };
}

export default interface DockerComposeTemplate {
  services: { [key: string]: DockerService };
}
