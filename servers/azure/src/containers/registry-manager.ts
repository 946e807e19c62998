/**
 * Azure Container Registry content: repositories, image manifests and tags
 * through the registry data plane (@azure/container-registry).
 */

import type { ArtifactManifestProperties, ContainerRegistryClient } from "@azure/container-registry";
import { NotFoundError } from "../../../../src/index.js";
import { collectAll, collectPaged } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { iso, type AzureCredentialProvider, type AzurePagedResult, type AzureRetryOptions } from "../types.js";
import type { RegistryImage, RegistryRepository } from "./types.js";

/** Registry name or login server to an endpoint URL. */
export function registryEndpoint(registry: string): string {
  const host = registry
    .trim()
    .replace(/^https?:\/\//i, "")
    .replace(/\/+$/, "");
  return `https://${host.includes(".") ? host : `${host}.azurecr.io`}`;
}

function mapManifest(m: ArtifactManifestProperties): RegistryImage {
  return {
    repository: m.repositoryName,
    digest: m.digest,
    tags: m.tags,
    sizeInBytes: m.sizeInBytes,
    architecture: m.architecture,
    operatingSystem: m.operatingSystem,
    createdOn: iso(m.createdOn),
    lastUpdatedOn: iso(m.lastUpdatedOn),
  };
}

export class AzureRegistryContentManager {
  private credentials: AzureCredentialProvider;
  private retryOptions?: AzureRetryOptions;

  constructor(credentials: AzureCredentialProvider, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.retryOptions = retryOptions;
  }

  private async getClient(registry: string): Promise<ContainerRegistryClient> {
    const { ContainerRegistryClient, KnownContainerRegistryAudience } = await import("@azure/container-registry");
    const { credential } = await this.credentials.getCredential();
    return new ContainerRegistryClient(registryEndpoint(registry), credential, {
      audience: KnownContainerRegistryAudience.AzureResourceManagerPublicCloud,
    });
  }

  async listRepositories(registry: string): Promise<string[]> {
    const client = await this.getClient(registry);
    return withAzureRetry(() => collectAll(client.listRepositoryNames(), (name) => name), this.retryOptions);
  }

  async getRepository(registry: string, repository: string): Promise<RegistryRepository> {
    const client = await this.getClient(registry);
    const props = await getOrNull(() => client.getRepository(repository).getProperties(), this.retryOptions);
    if (!props) throw new NotFoundError("Repository", repository);
    return {
      name: props.name,
      manifestCount: props.manifestCount,
      tagCount: props.tagCount,
      createdOn: iso(props.createdOn),
      lastUpdatedOn: iso(props.lastUpdatedOn),
    };
  }

  /** Image manifests of a repository, most recently updated first. */
  async listImages(registry: string, repository: string, limit?: number): Promise<AzurePagedResult<RegistryImage>> {
    const client = await this.getClient(registry);
    return withAzureRetry(
      () =>
        collectPaged(
          client.getRepository(repository).listManifestProperties({ order: "LastUpdatedOnDescending" }),
          mapManifest,
          undefined,
          { limit },
        ),
      this.retryOptions,
    );
  }

  async getImage(registry: string, repository: string, tagOrDigest: string): Promise<RegistryImage> {
    const client = await this.getClient(registry);
    const manifest = await getOrNull(
      () => client.getArtifact(repository, tagOrDigest).getManifestProperties(),
      this.retryOptions,
    );
    if (!manifest) throw new NotFoundError("Image", `${repository}:${tagOrDigest}`);
    return mapManifest(manifest);
  }

  /** Delete a manifest and every tag that points at it. */
  async deleteImage(registry: string, repository: string, tagOrDigest: string): Promise<void> {
    const client = await this.getClient(registry);
    await withAzureRetry(() => client.getArtifact(repository, tagOrDigest).delete(), this.retryOptions);
  }

  async deleteRepository(registry: string, repository: string): Promise<void> {
    const client = await this.getClient(registry);
    await withAzureRetry(() => client.deleteRepository(repository), this.retryOptions);
  }
}
