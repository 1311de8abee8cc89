import "reflect-metadata";
import { Bench } from "tinybench";
import { Type } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";
import { BoundaryValidator, Schema, roundtrip } from "@jsonable/runtime";
import { generateAmounts, generateLazyAmounts, generateOrder } from "./generators";

const TIME_MS = 200;
const WARMUP_MS = 50;

// ── Schemas ──────────────────────────────────────────────────────

const AmountsSchema = Type.Array(Type.Number());
const OrderSchema = Type.Object({
  id: Type.Integer(),
  placedAt: Type.String({ format: "date-time" }),
  customer: Type.Object({ name: Type.String(), email: Type.String({ format: "email" }) }),
  tags: Type.Array(Type.String()),
  lines: Type.Array(
    Type.Object({ sku: Type.String(), quantity: Type.Integer({ minimum: 1 }), price: Type.Number() }),
  ),
});
const AmountsCheck = TypeCompiler.Compile(AmountsSchema);

// ── Consumers ────────────────────────────────────────────────────

function total(amounts: Iterable<number>): number {
  let sum = 0;
  for (const amount of amounts) sum += amount;
  return sum;
}

function lineCount(order: { lines: unknown[] }): number {
  return order.lines.length;
}

const validated = new BoundaryValidator({ validation: true }).decorator();
const passThrough = new BoundaryValidator({ validation: false }).decorator();

const checkedTotal = validated(Schema(AmountsSchema)(total));
const uncheckedTotal = passThrough(Schema(AmountsSchema)(total));
const checkedLineCount = validated(Schema(OrderSchema)(lineCount));

// ── Data ─────────────────────────────────────────────────────────

const amounts = generateAmounts(1000);
const lazyAmounts = generateLazyAmounts(1000);
const order = generateOrder();

interface BenchDef {
  name: string;
  fn: () => unknown;
}

const benchmarks: BenchDef[] = [
  { name: "Amounts/raw", fn: () => total(amounts) },
  { name: "Amounts/validation_disabled", fn: () => uncheckedTotal(amounts) },
  { name: "Amounts/validated", fn: () => checkedTotal(amounts) },
  { name: "Amounts/validated_lazy", fn: () => checkedTotal(lazyAmounts) },
  { name: "Amounts/roundtrip_only", fn: () => roundtrip(amounts) },
  { name: "Amounts/typebox_compiled_check", fn: () => AmountsCheck.Check(amounts) },
  { name: "Order/raw", fn: () => lineCount(order) },
  { name: "Order/validated", fn: () => checkedLineCount(order) },
  { name: "Order/roundtrip_only", fn: () => roundtrip(order) },
];

async function main(): Promise<void> {
  console.log("=== JSONable boundary overhead ===\n");
  console.log(`Node.js ${process.version}`);
  console.log(`Date: ${new Date().toISOString()}\n`);

  const bench = new Bench({ time: TIME_MS, warmupTime: WARMUP_MS });
  for (const def of benchmarks) {
    bench.add(def.name, def.fn);
  }
  await bench.run();

  console.table(bench.table());
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
