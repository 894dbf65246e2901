import { ByteWriter } from "../../binary";
import { estimateChunkSize, getVarIntLength, reverseBytes } from "../../buffer/buffer-utils";
import { Bytes, fromHex } from "../../bytes";
import { TransactionInput } from "../../bitcoin/transaction-input";
import { TransactionOutput } from "../../bitcoin/transaction-output";

export type TransactionParts = {
  version: number;
  inputs: TransactionInput[];
  outputs: TransactionOutput[];
  lockTime: number;
};

const inputSize = (input: TransactionInput) =>
  32 + 4 + estimateChunkSize(input.UnlockingScript.length) + 4;

const outputSize = (output: TransactionOutput) =>
  8 + estimateChunkSize(output.LockingScript.length);

export class TransactionWriter {
  static size = ({ inputs, outputs }: TransactionParts) =>
    4 +
    getVarIntLength(inputs.length) +
    inputs.reduce((sum, input) => sum + inputSize(input), 0) +
    getVarIntLength(outputs.length) +
    outputs.reduce((sum, output) => sum + outputSize(output), 0) +
    4;

  static write = (parts: TransactionParts): Bytes => {
    const writer = ByteWriter.fromSize(TransactionWriter.size(parts));

    writer.writeUInt32(parts.version);
    writer.writeVarInt(parts.inputs.length);
    for (const input of parts.inputs) TransactionWriter.writeInput(writer, input);

    writer.writeVarInt(parts.outputs.length);
    for (const output of parts.outputs)
      TransactionWriter.writeOutput(writer, output);

    writer.writeUInt32(parts.lockTime);

    return writer.buffer;
  };

  static writeInput = (writer: ByteWriter, input: TransactionInput) => {
    writer.writeChunk(reverseBytes(fromHex(input.TxId)));
    writer.writeUInt32(input.Vout);
    writer.writeVarChunk(input.UnlockingScript);
    writer.writeUInt32(input.Sequence);
  };

  static writeOutput = (writer: ByteWriter, output: TransactionOutput) => {
    writer.writeUInt64(output.Satoshis);
    writer.writeVarChunk(output.LockingScript);
  };
}
