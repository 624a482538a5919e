import { randomUUID } from "node:crypto";
import type { ToolRegistry } from "../tools/tool_registry";

export interface Project {
    id: string;
    name: string;
    description: string;
}

export interface ProjectDetails extends Project {
    isActive: boolean;
}

export class ProjectNotFoundError extends Error {
    constructor(readonly projectId: string) {
        super(`Project not found: ${projectId}`);
        this.name = "ProjectNotFoundError";
    }
}

/** In-memory project list with one optional active project. */
export class ProjectStore {
    private readonly projects = new Map<string, Project>();
    private activeId: string | null = null;

    constructor(private readonly generateId: () => string = randomUUID) {}

    list(): ProjectDetails[] {
        return Array.from(this.projects.values(), (project) => this.details(project));
    }

    create(name: string, description: string): Project {
        const project = { id: this.generateId(), name: name.trim(), description: description.trim() };
        this.projects.set(project.id, project);
        return { ...project };
    }

    delete(projectId: string): Project {
        const project = this.require(projectId);
        this.projects.delete(projectId);
        if (this.activeId === projectId) this.activeId = null;
        return project;
    }

    switchTo(projectId: string): Project {
        const project = this.require(projectId);
        this.activeId = projectId;
        return project;
    }

    get(projectId: string): ProjectDetails {
        return this.details(this.require(projectId));
    }

    getActive(): ProjectDetails | null {
        if (this.activeId === null) return null;
        const project = this.projects.get(this.activeId);
        return project ? this.details(project) : null;
    }

    private require(projectId: string): Project {
        const project = this.projects.get(projectId);
        if (!project) throw new ProjectNotFoundError(projectId);
        return { ...project };
    }

    private details(project: Project): ProjectDetails {
        return { ...project, isActive: project.id === this.activeId };
    }
}

function formatProjectList(projects: ProjectDetails[]): string {
    if (projects.length === 0) return "No projects yet.";
    return projects
        .map((p) => `ID: ${p.id}${p.isActive ? " (ACTIVE)" : ""}\nName: ${p.name}\nDescription: ${p.description}`)
        .join("\n\n");
}

const projectIdParam = { project_id: { type: "string", description: "ID of the project" } } as const;

/** Registers the project-management tools the bot exposes to the model. */
export function registerProjectTools(registry: ToolRegistry, store: ProjectStore): ToolRegistry {
    return registry
        .register(
            { name: "list_projects", description: "List all available projects.", parameters: {} },
            () => formatProjectList(store.list())
        )
        .register(
            {
                name: "create_project",
                description: "Create a new project and return its ID.",
                parameters: {
                    name: { type: "string", description: "Project name" },
                    description: { type: "string", description: "Project description" },
                },
            },
            (args) => store.create(String(args.name), String(args.description)).id
        )
        .register(
            { name: "delete_project", description: "Delete a project by ID.", parameters: projectIdParam },
            (args) => {
                const project = store.delete(String(args.project_id));
                return `Project '${project.name}' (ID: ${project.id}) has been deleted`;
            }
        )
        .register(
            { name: "switch_project", description: "Make a project the active one.", parameters: projectIdParam },
            (args) => {
                const project = store.switchTo(String(args.project_id));
                return `Switched to project '${project.name}' (ID: ${project.id})`;
            }
        )
        .register(
            { name: "get_project_details", description: "Get project details by ID.", parameters: projectIdParam },
            (args) => store.get(String(args.project_id))
        )
        .register(
            { name: "get_active_project", description: "Get the active project, if any.", parameters: {} },
            () => store.getActive() ?? "No active project."
        );
}
