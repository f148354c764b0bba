import { Pool, PoolClient } from "pg";
import type { ArtifactFile, BuildArtifact, Project } from "../types.js";

/** Persistence boundary for projects and the artifacts retained per Version. */
export interface ProjectRepository {
  create(project: Project): Promise<Project>;
  get(projectId: string): Promise<Project | null>;
  save(project: Project): Promise<void>;
  list(): Promise<Project[]>;
  saveArtifact(projectId: string, versionId: string, artifact: BuildArtifact): Promise<void>;
  getArtifact(projectId: string, versionId: string): Promise<BuildArtifact | null>;
}

function cloneArtifact(artifact: BuildArtifact): BuildArtifact {
  return {
    entry: artifact.entry,
    files: artifact.files.map((file) => ({ path: file.path, contentType: file.contentType, bytes: Buffer.from(file.bytes) }))
  };
}

export class InMemoryProjectRepository implements ProjectRepository {
  private readonly projects = new Map<string, Project>();
  private readonly artifacts = new Map<string, BuildArtifact>();

  async create(project: Project): Promise<Project> {
    if (this.projects.has(project.id)) {
      throw new Error(`Project '${project.id}' already exists.`);
    }
    this.projects.set(project.id, structuredClone(project));
    return structuredClone(project);
  }

  async get(projectId: string): Promise<Project | null> {
    const project = this.projects.get(projectId);
    return project ? structuredClone(project) : null;
  }

  async save(project: Project): Promise<void> {
    if (!this.projects.has(project.id)) {
      throw new Error(`Project '${project.id}' does not exist.`);
    }
    this.projects.set(project.id, structuredClone(project));
  }

  async list(): Promise<Project[]> {
    return Array.from(this.projects.values())
      .sort((left, right) => left.createdAt.localeCompare(right.createdAt))
      .map((project) => structuredClone(project));
  }

  async saveArtifact(projectId: string, versionId: string, artifact: BuildArtifact): Promise<void> {
    this.artifacts.set(`${projectId}:${versionId}`, cloneArtifact(artifact));
  }

  async getArtifact(projectId: string, versionId: string): Promise<BuildArtifact | null> {
    const artifact = this.artifacts.get(`${projectId}:${versionId}`);
    return artifact ? cloneArtifact(artifact) : null;
  }
}

const schemaSql = `
CREATE TABLE IF NOT EXISTS projects (
  id TEXT PRIMARY KEY,
  slug TEXT NOT NULL,
  status TEXT NOT NULL,
  document JSONB NOT NULL,
  created_at TIMESTAMPTZ NOT NULL,
  updated_at TIMESTAMPTZ NOT NULL
);

CREATE INDEX IF NOT EXISTS projects_created_at_idx ON projects (created_at);

CREATE TABLE IF NOT EXISTS version_artifacts (
  project_id TEXT NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  version_id TEXT NOT NULL,
  entry TEXT NOT NULL,
  files JSONB NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  PRIMARY KEY (project_id, version_id)
);
`;

interface DbProjectRow {
  document: Project;
}

interface StoredArtifactFile {
  path: string;
  contentType: string;
  base64: string;
}

interface DbArtifactRow {
  entry: string;
  files: StoredArtifactFile[];
}

export interface PostgresProjectRepositoryOptions {
  databaseUrl: string;
  ssl?: boolean;
}

/** Stores each project as one JSONB document; artifacts live in their own table. */
export class PostgresProjectRepository implements ProjectRepository {
  private readonly pool: Pool;

  constructor(options: PostgresProjectRepositoryOptions) {
    this.pool = new Pool({
      connectionString: options.databaseUrl,
      ssl: options.ssl ? { rejectUnauthorized: true } : undefined
    });
  }

  async initialize(): Promise<void> {
    const client = await this.pool.connect();

    try {
      await client.query(`SELECT pg_advisory_lock(51730219)`);
      await client.query(schemaSql);
    } finally {
      await client.query(`SELECT pg_advisory_unlock(51730219)`);
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async withTransaction<T>(runner: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query("BEGIN");
      const result = await runner(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async create(project: Project): Promise<Project> {
    await this.pool.query(
      `INSERT INTO projects (id, slug, status, document, created_at, updated_at)
       VALUES ($1, $2, $3, $4::jsonb, $5::timestamptz, $6::timestamptz)`,
      [project.id, project.slug, project.status, JSON.stringify(project), project.createdAt, project.updatedAt]
    );
    return project;
  }

  async get(projectId: string): Promise<Project | null> {
    const result = await this.pool.query<DbProjectRow>(`SELECT document FROM projects WHERE id = $1`, [projectId]);
    return result.rows[0]?.document ?? null;
  }

  async save(project: Project): Promise<void> {
    await this.withTransaction(async (client) => {
      const result = await client.query(
        `UPDATE projects
         SET slug = $2, status = $3, document = $4::jsonb, updated_at = $5::timestamptz
         WHERE id = $1`,
        [project.id, project.slug, project.status, JSON.stringify(project), project.updatedAt]
      );

      if (result.rowCount === 0) {
        throw new Error(`Project '${project.id}' does not exist.`);
      }
    });
  }

  async list(): Promise<Project[]> {
    const result = await this.pool.query<DbProjectRow>(`SELECT document FROM projects ORDER BY created_at ASC`);
    return result.rows.map((row) => row.document);
  }

  async saveArtifact(projectId: string, versionId: string, artifact: BuildArtifact): Promise<void> {
    const files: StoredArtifactFile[] = artifact.files.map((file) => ({
      path: file.path,
      contentType: file.contentType,
      base64: file.bytes.toString("base64")
    }));

    await this.pool.query(
      `INSERT INTO version_artifacts (project_id, version_id, entry, files)
       VALUES ($1, $2, $3, $4::jsonb)
       ON CONFLICT (project_id, version_id) DO UPDATE SET entry = EXCLUDED.entry, files = EXCLUDED.files`,
      [projectId, versionId, artifact.entry, JSON.stringify(files)]
    );
  }

  async getArtifact(projectId: string, versionId: string): Promise<BuildArtifact | null> {
    const result = await this.pool.query<DbArtifactRow>(
      `SELECT entry, files FROM version_artifacts WHERE project_id = $1 AND version_id = $2`,
      [projectId, versionId]
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }

    const files: ArtifactFile[] = row.files.map((file) => ({
      path: file.path,
      contentType: file.contentType,
      bytes: Buffer.from(file.base64, "base64")
    }));

    return { entry: row.entry, files };
  }
}
