/**
 * RoleDirectory over the configuration store.
 *
 *   {Role}Email_{entity}  →  default{Role}Email  →  no recipient
 *   chatWebhook_{entity}  →  defaultChatWebhook  →  no webhook
 *
 * Blank values count as absent. Store failures reject.
 */

import { ConfigKeys } from "@closegate/cube";
import type { ConfigStore } from "@closegate/cube";
import type { NotificationRole, RoleDirectory } from "./types.js";

export class ConfigRoleDirectory implements RoleDirectory {
  constructor(private readonly store: ConfigStore) {}

  resolve(entity: string, role: NotificationRole): Promise<string | undefined> {
    return this.firstOf([ConfigKeys.roleAddress(role, entity), ConfigKeys.defaultRoleAddress(role)]);
  }

  webhookUrl(entity: string): Promise<string | undefined> {
    return this.firstOf([ConfigKeys.chatWebhook(entity), ConfigKeys.defaultChatWebhook()]);
  }

  private async firstOf(keys: readonly string[]): Promise<string | undefined> {
    for (const key of keys) {
      const value = (await this.store.get(key))?.trim();
      if (value !== undefined && value.length > 0) {
        return value;
      }
    }
    return undefined;
  }
}
