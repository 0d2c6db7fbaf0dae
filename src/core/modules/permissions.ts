// src/core/modules/permissions.ts

/**
 * Capabilities a module asks the chat platform for. Stored as a bit set.
 */
export const PERMISSION_FLAGS = {
    view_channels: 1 << 0,
    send_messages: 1 << 1,
    send_messages_in_threads: 1 << 2,
    embed_links: 1 << 3,
    attach_files: 1 << 4,
    add_reactions: 1 << 5,
    read_message_history: 1 << 6,
    mention_everyone: 1 << 7,
    use_external_emojis: 1 << 8,
    use_application_commands: 1 << 9,
    manage_messages: 1 << 10,
    manage_threads: 1 << 11,
    manage_channels: 1 << 12,
    manage_roles: 1 << 13,
    manage_webhooks: 1 << 14,
    manage_guild: 1 << 15,
    kick_members: 1 << 16,
    ban_members: 1 << 17,
    moderate_members: 1 << 18,
    connect: 1 << 19,
    speak: 1 << 20,
    administrator: 1 << 21,
} as const;

export type PermissionName = keyof typeof PERMISSION_FLAGS;

export function isPermissionName(name: string): name is PermissionName {
    return Object.prototype.hasOwnProperty.call(PERMISSION_FLAGS, name);
}

export class Permissions {
    constructor(public readonly value: number = 0) { }

    public static fromNames(names: Iterable<PermissionName>): Permissions {
        let value = 0;
        for (const name of names) value |= PERMISSION_FLAGS[name];
        return new Permissions(value);
    }

    public has(name: PermissionName): boolean {
        return (this.value & PERMISSION_FLAGS[name]) !== 0;
    }

    public toArray(): PermissionName[] {
        return Object.keys(PERMISSION_FLAGS).filter(isPermissionName).filter(name => this.has(name));
    }

    public toJSON(): PermissionName[] {
        return this.toArray();
    }
}
