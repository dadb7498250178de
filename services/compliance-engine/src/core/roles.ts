import {
  type AssignableRole,
  isAssignableRole,
  ROLE,
  type RoleCode,
} from "@cledger/shared";
import { CorruptValueError, decodeUint64, encodeUint64 } from "../storage/codec.js";
import { roleKey } from "../storage/keys.js";
import type { KeyValueReader } from "../storage/ledger-store.js";
import { type Account, sameAccount } from "./account.js";
import type { CallContext } from "./context.js";
import { fail, ok, type Result } from "./result.js";

export class RoleRegistry {
  constructor(private readonly administrator: Account) {}

  isAdministrator(account: Account): boolean {
    return sameAccount(account, this.administrator);
  }

  getRole(store: KeyValueReader, account: Account): RoleCode {
    if (this.isAdministrator(account)) return ROLE.ADMIN;
    const stored = store.get(roleKey(account.bytes));
    if (!stored) return ROLE.NONE;
    const role = decodeUint64(stored);
    if (!isAssignableRole(role)) {
      throw new CorruptValueError(`Stored role ${role} for ${account.address} is not assignable`);
    }
    return role;
  }

  assignRole(
    call: CallContext,
    caller: Account,
    account: Account,
    role: number,
  ): Result<AssignableRole> {
    if (!this.isAdministrator(caller)) {
      return fail("UNAUTHORIZED", "Only the administrator can assign roles");
    }
    if (!isAssignableRole(role)) {
      return fail("INVALID_ARGUMENT", `Role must be ${ROLE.VENDOR} (vendor) or ${ROLE.INSPECTOR} (inspector)`);
    }

    call.store.put(roleKey(account.bytes), encodeUint64(role));
    call.audit.emit("assign_role", account.bytes, caller.bytes);
    return ok(role);
  }
}
