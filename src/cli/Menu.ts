/**
 * @file Catalog Menu
 *
 * Numbered interactive menu over a CatalogSession. Every name and category
 * read here is trimmed and lowercased before it reaches the catalog; the
 * catalog itself matches exactly.
 *
 * Reprompt loops live here and only here. End of input at any prompt
 * abandons the current command and leaves the menu.
 *
 * @module
 */

import chalk from 'chalk';
import type { CatalogObject, Container } from '../catalog/types.js';
import type { CatalogSession, MutationResult, SaveResult, SearchHit } from '../session/CatalogSession.js';
import type { LineChannel } from './LineChannel.js';
import { object_create } from '../catalog/model.js';
import {
    listing_render,
    menu_render,
    searchHit_render,
    success_style,
    error_style,
    warning_style
} from './render.js';

// ─── Menu Definition ────────────────────────────────────────────────────────

export type MenuChoice = 'view' | 'search' | 'add' | 'edit' | 'delete' | 'exit';

export const MENU_OPTIONS: ReadonlyArray<readonly [string, string, MenuChoice]> = [
    ['1', 'view all objects in the catalog.', 'view'],
    ['2', 'search for an object by name.', 'search'],
    ['3', 'add a new object to the catalog.', 'add'],
    ['4', 'edit an existing object.', 'edit'],
    ['5', 'delete an object from the catalog.', 'delete'],
    ['6', 'exit.', 'exit'],
];

const ADD_OPTIONS: ReadonlyArray<readonly [string, string]> = [
    ['1', 'add an object to an existing container.'],
    ['2', 'create a new container and add an object to it.'],
];

type InsertionKind = 'objects' | 'containers';

const CONTAINER_PROMPTS: Record<InsertionKind, string> = {
    objects: "Enter the name of the container where you want to add the object (e.g. 'house', 'kitchen'): ",
    containers: "Enter the name of the container where the new container should be added (e.g. 'house', 'kitchen'): ",
};

const CONTAINER_ERRORS: Record<InsertionKind, string> = {
    objects: 'Container not found. Please try again!',
    containers: 'Container where you want to insert the new container not found. Please try again!',
};

export const MESSAGES = {
    banner: 'Welcome to the Cataloger of Household Objects!',
    choicePrompt: '\nChoose an option: ',
    invalidChoice: 'Invalid input. Please try again!',
    invalidAddChoice: 'Invalid input. Please enter 1 or 2!',
    notFound: 'Object not found in the catalog!',
    added: 'Object successfully added to the catalog!',
    containerAdded: 'New container and object successfully added to the catalog!',
    modified: 'Object successfully modified in the catalog!',
    deleted: 'Object successfully deleted from the catalog!',
    goodbye: 'Goodbye.',
} as const;

/**
 * Trim and lowercase a raw input line.
 */
export function input_normalize(raw: string): string {
    return raw.trim().toLowerCase();
}

/**
 * Map a raw menu entry to its choice, or null if it is not a menu key.
 */
export function menuChoice_resolve(raw: string): MenuChoice | null {
    const key: string = raw.trim();
    const option: readonly [string, string, MenuChoice] | undefined =
        MENU_OPTIONS.find(([optionKey]): boolean => optionKey === key);
    return option ? option[2] : null;
}

// ─── Menu ───────────────────────────────────────────────────────────────────

export class CatalogMenu {
    constructor(
        private readonly session: CatalogSession,
        private readonly channel: LineChannel
    ) {}

    /**
     * Show the banner and serve menu choices until exit or end of input.
     */
    public async run(): Promise<void> {
        this.channel.print(chalk.bold(MESSAGES.banner));
        this.channel.print();

        for (;;) {
            for (const line of menu_render(MENU_OPTIONS.map(([key, label]): readonly [string, string] => [key, label]))) {
                this.channel.print(line);
            }

            const choice: MenuChoice | null = await this.choice_read();
            if (choice === null || choice === 'exit') {
                this.channel.print(chalk.dim(MESSAGES.goodbye));
                return;
            }

            const completed: boolean = await this.choice_dispatch(choice);
            this.channel.print();
            if (!completed) {
                this.channel.print(chalk.dim(MESSAGES.goodbye));
                return;
            }
        }
    }

    /**
     * Run one menu command.
     *
     * @returns False if input ended part-way through the command.
     */
    public async choice_dispatch(choice: Exclude<MenuChoice, 'exit'>): Promise<boolean> {
        switch (choice) {
            case 'view':   return this.catalog_view();
            case 'search': return this.object_searchPrompt();
            case 'add':    return this.object_addPrompt();
            case 'edit':   return this.object_editPrompt();
            case 'delete': return this.object_deletePrompt();
        }
    }

    // ─── Commands ───────────────────────────────────────────────

    private async catalog_view(): Promise<boolean> {
        for (const line of listing_render(this.session.objects_list())) {
            this.channel.print(line);
        }
        return true;
    }

    private async object_searchPrompt(): Promise<boolean> {
        const name: string | null = await this.normalized_ask('Enter the name of the object to search: ');
        if (name === null) return false;

        const hit: SearchHit | null = this.session.object_search(name);
        if (!hit) {
            this.channel.print(error_style(MESSAGES.notFound));
            return true;
        }

        for (const line of searchHit_render(hit)) {
            this.channel.print(line);
        }
        return true;
    }

    private async object_addPrompt(): Promise<boolean> {
        for (const line of menu_render(ADD_OPTIONS)) {
            this.channel.print(line);
        }

        let choice: string | null = null;
        for (;;) {
            const raw: string | null = await this.channel.question(MESSAGES.choicePrompt);
            if (raw === null) return false;
            choice = raw.trim();
            if (choice === '1' || choice === '2') break;
            this.channel.print(error_style(MESSAGES.invalidAddChoice));
        }

        if (choice === '1') {
            const obj: CatalogObject | null = await this.object_prompt();
            if (!obj) return false;
            const container: Container | null = await this.container_prompt('objects');
            if (!container) return false;

            const result: SaveResult = await this.session.object_add(container, obj);
            this.saveResult_report(result, MESSAGES.added);
            return true;
        }

        const containerName: string | null = await this.normalized_ask('Enter the name of the new container: ');
        if (containerName === null) return false;
        const parent: Container | null = await this.container_prompt('containers');
        if (!parent) return false;
        const obj: CatalogObject | null = await this.object_prompt();
        if (!obj) return false;

        const result: SaveResult = await this.session.containerWithObject_add(parent, containerName, obj);
        this.saveResult_report(result, MESSAGES.containerAdded);
        return true;
    }

    private async object_editPrompt(): Promise<boolean> {
        const name: string | null = await this.normalized_ask('Enter the name of the object to modify: ');
        if (name === null) return false;
        const newName: string | null = await this.normalized_ask('Enter the new name of the object (blank line to keep it unchanged): ');
        if (newName === null) return false;
        const newCategory: string | null = await this.normalized_ask('Enter the new category of the object (blank line to keep it unchanged): ');
        if (newCategory === null) return false;

        const result: MutationResult = await this.session.object_update(name, newName, newCategory);
        this.mutationResult_report(result, MESSAGES.modified);
        return true;
    }

    private async object_deletePrompt(): Promise<boolean> {
        const name: string | null = await this.normalized_ask('Enter the name of the object to delete: ');
        if (name === null) return false;

        const result: MutationResult = await this.session.object_remove(name);
        this.mutationResult_report(result, MESSAGES.deleted);
        return true;
    }

    // ─── Prompt Helpers ─────────────────────────────────────────

    private async choice_read(): Promise<MenuChoice | null> {
        for (;;) {
            const raw: string | null = await this.channel.question(MESSAGES.choicePrompt);
            if (raw === null) return null;

            const choice: MenuChoice | null = menuChoice_resolve(raw);
            if (choice) return choice;
            this.channel.print(error_style(MESSAGES.invalidChoice));
        }
    }

    private async normalized_ask(prompt: string): Promise<string | null> {
        const raw: string | null = await this.channel.question(prompt);
        return raw === null ? null : input_normalize(raw);
    }

    private async object_prompt(): Promise<CatalogObject | null> {
        const name: string | null = await this.normalized_ask('Enter the name of the object to add to the catalog: ');
        if (name === null) return null;
        const category: string | null = await this.normalized_ask('Enter the category of the object to add: ');
        if (category === null) return null;
        return object_create(name, category);
    }

    /**
     * Ask for a container name until one exists in the catalog.
     */
    private async container_prompt(kind: InsertionKind): Promise<Container | null> {
        for (;;) {
            const name: string | null = await this.normalized_ask(CONTAINER_PROMPTS[kind]);
            if (name === null) return null;

            const container: Container | null = this.session.container_find(name);
            if (container) return container;
            this.channel.print(error_style(CONTAINER_ERRORS[kind]));
        }
    }

    // ─── Reporting ──────────────────────────────────────────────

    private mutationResult_report(result: MutationResult, successMessage: string): void {
        if (!result.found) {
            this.channel.print(error_style(MESSAGES.notFound));
            return;
        }
        this.saveResult_report(result, successMessage);
    }

    private saveResult_report(result: SaveResult, successMessage: string): void {
        this.channel.print(success_style(successMessage));
        if (!result.saved) {
            this.channel.print(warning_style(
                `Warning: the change could not be saved to '${this.session.path_get()}' and exists only in memory.`
            ));
        }
    }
}
