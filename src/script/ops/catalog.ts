import { MAX_DIRECT_PUSH } from "../../bitcoin/op-codes";
import { arithmeticOperations } from "./arithmetic-ops";
import { cryptoOperations } from "./crypto-ops";
import { flowOperations } from "./flow-ops";
import { ScriptOperation } from "./operation";
import { stackOperations } from "./stack-ops";

/** Maps an opcode byte to its shared operation object. */
export class OperationCatalog {
  private readonly operations = new Map<number, ScriptOperation>();
  private sealed = false;

  constructor(operations: ScriptOperation[] = []) {
    for (const operation of operations) this.register(operation);
  }

  register = (operation: ScriptOperation) => {
    if (this.sealed) throw new Error("Catalog is sealed");

    const code = operation.opCodeNum;

    if (!Number.isInteger(code) || code < 0 || code > 0xff)
      throw new Error(`Opcode out of byte range: ${code}`);
    if (code >= 1 && code <= MAX_DIRECT_PUSH)
      throw new Error(`Opcode 0x${code.toString(16)} is reserved for data pushes`);

    this.operations.set(code, operation);

    return this;
  };

  lookup = (opcode: number): ScriptOperation | undefined =>
    this.operations.get(opcode);

  has = (opcode: number) => this.operations.has(opcode);

  /** Rejects further registrations; the catalog is then safe to share. */
  seal = () => {
    this.sealed = true;
    return this;
  };

  /** Copy of this catalog with `operations` added or replaced. */
  extend = (operations: ScriptOperation[]) =>
    new OperationCatalog([...this.operations.values(), ...operations]);

  get size() {
    return this.operations.size;
  }
}

export const DefaultCatalog = new OperationCatalog([
  ...flowOperations,
  ...stackOperations,
  ...arithmeticOperations,
  ...cryptoOperations,
]).seal();
