import { CPU } from "../src/cpu";
import { CPUState } from "../src/enums/cpu-state";
import { Flag } from "../src/enums/flags";
import { Register } from "../src/enums/registers";
import { ReservedOpcodeError, UnknownTrapError } from "../src/errors";
import { FakeIO } from "./fake-io";

function boot(program: number[], input: number[] = []) {
  const io = new FakeIO(input);
  const cpu = new CPU(io);
  cpu.loadArray([0x3000, ...program]);
  const { memory, registers } = cpu.machine;
  return { cpu, io, memory, registers };
}

describe("CPU", () => {
  describe("ADD", () => {
    it("adds a sign-extended immediate", () => {
      // ADD R0, R1, #5
      const { cpu, registers } = boot([0x1065]);
      registers.set(Register.R1, 10);
      expect(cpu.step()).toBe(CPUState.RUNNING);
      expect(registers.get(Register.R0)).toBe(15);
      expect(registers.cond).toBe(Flag.POS);
      expect(registers.pc).toBe(0x3001);
    });

    it("adds two registers modulo 2^16", () => {
      // ADD R0, R1, R2
      const { cpu, registers } = boot([0x1042]);
      registers.set(Register.R1, 0x8000);
      registers.set(Register.R2, 0x8000);
      registers.cond = Flag.POS;
      cpu.step();
      expect(registers.get(Register.R0)).toBe(0);
      expect(registers.cond).toBe(Flag.ZRO);
    });

    it("subtracts with a negative immediate", () => {
      // ADD R2, R2, #-1
      const { cpu, registers } = boot([0x14bf]);
      cpu.step();
      expect(registers.get(Register.R2)).toBe(0xffff);
      expect(registers.cond).toBe(Flag.NEG);
    });
  });

  describe("AND", () => {
    it("clears a register with #0", () => {
      // AND R3, R3, #0
      const { cpu, registers } = boot([0x56e0]);
      registers.set(Register.R3, 0x1234);
      registers.cond = Flag.POS;
      cpu.step();
      expect(registers.get(Register.R3)).toBe(0);
      expect(registers.cond).toBe(Flag.ZRO);
    });

    it("masks two registers", () => {
      // AND R0, R1, R2
      const { cpu, registers } = boot([0x5042]);
      registers.set(Register.R1, 0xff0f);
      registers.set(Register.R2, 0x0ff0);
      cpu.step();
      expect(registers.get(Register.R0)).toBe(0x0f00);
      expect(registers.cond).toBe(Flag.POS);
    });
  });

  it("NOT complements a register", () => {
    // NOT R1, R0
    const { cpu, registers } = boot([0x923f]);
    registers.set(Register.R0, 0x00ff);
    cpu.step();
    expect(registers.get(Register.R1)).toBe(0xff00);
    expect(registers.cond).toBe(Flag.NEG);
  });

  describe("BR", () => {
    it("branches when the mask includes the current flag", () => {
      // BRz #5
      const { cpu, registers } = boot([0x0405]);
      cpu.step();
      expect(registers.pc).toBe(0x3006);
    });

    it("falls through when the mask excludes the current flag", () => {
      // BRp #5
      const { cpu, registers } = boot([0x0205]);
      cpu.step();
      expect(registers.pc).toBe(0x3001);
    });

    it("branches backwards", () => {
      // BRnzp #-1
      const { cpu, registers } = boot([0x0fff]);
      cpu.step();
      expect(registers.pc).toBe(0x3000);
    });

    it("never branches with an empty mask", () => {
      const { cpu, registers } = boot([0x0005]);
      cpu.step();
      expect(registers.pc).toBe(0x3001);
    });

    it("leaves the flags alone", () => {
      const { cpu, registers } = boot([0x0205]);
      registers.cond = Flag.NEG;
      cpu.step();
      expect(registers.cond).toBe(Flag.NEG);
    });
  });

  it("JMP R7 returns to the link address", () => {
    const { cpu, registers } = boot([0xc1c0]);
    registers.set(Register.R7, 0x4000);
    cpu.step();
    expect(registers.pc).toBe(0x4000);
  });

  describe("JSR", () => {
    it("links R7 and jumps by a PC offset", () => {
      // JSR #2
      const { cpu, registers } = boot([0x4802]);
      cpu.step();
      expect(registers.get(Register.R7)).toBe(0x3001);
      expect(registers.pc).toBe(0x3003);
    });

    it("JSRR jumps to a base register", () => {
      // JSRR R3
      const { cpu, registers } = boot([0x40c0]);
      registers.set(Register.R3, 0x5000);
      cpu.step();
      expect(registers.get(Register.R7)).toBe(0x3001);
      expect(registers.pc).toBe(0x5000);
    });

    it("JSRR R7 reads the base after linking", () => {
      const { cpu, registers } = boot([0x41c0]);
      registers.set(Register.R7, 0x5000);
      cpu.step();
      expect(registers.pc).toBe(0x3001);
    });
  });

  describe("loads", () => {
    it("LD reads PC-relative memory", () => {
      // LD R2, #2
      const { cpu, memory, registers } = boot([0x2402]);
      memory.write(0x3003, 0x8001);
      cpu.step();
      expect(registers.get(Register.R2)).toBe(0x8001);
      expect(registers.cond).toBe(Flag.NEG);
    });

    it("LDI follows a pointer", () => {
      // LDI R0, #1
      const { cpu, memory, registers } = boot([0xa001]);
      memory.write(0x3002, 0x4000);
      memory.write(0x4000, 42);
      cpu.step();
      expect(registers.get(Register.R0)).toBe(42);
      expect(registers.cond).toBe(Flag.POS);
    });

    it("LDR reads base + offset", () => {
      // LDR R4, R2, #-2
      const { cpu, memory, registers } = boot([0x68be]);
      registers.set(Register.R2, 0x4002);
      memory.write(0x4000, 7);
      cpu.step();
      expect(registers.get(Register.R4)).toBe(7);
      expect(registers.cond).toBe(Flag.POS);
    });

    it("LDR wraps the effective address", () => {
      // LDR R0, R1, #1
      const { cpu, memory, registers } = boot([0x6041]);
      registers.set(Register.R1, 0xffff);
      memory.write(0x0000, 9);
      cpu.step();
      expect(registers.get(Register.R0)).toBe(9);
    });

    it("LEA loads the address, not its contents", () => {
      // LEA R5, #-3
      const { cpu, memory, registers } = boot([0xebfd]);
      memory.write(0x2ffe, 0x1111);
      cpu.step();
      expect(registers.get(Register.R5)).toBe(0x2ffe);
      expect(registers.cond).toBe(Flag.POS);
    });
  });

  describe("stores", () => {
    it("ST writes PC-relative memory without touching flags", () => {
      // ST R1, #4
      const { cpu, memory, registers } = boot([0x3204]);
      registers.set(Register.R1, 0xbeef);
      cpu.step();
      expect(memory.peek(0x3005)).toBe(0xbeef);
      expect(registers.cond).toBe(Flag.ZRO);
    });

    it("STI writes through a pointer", () => {
      // STI R1, #1
      const { cpu, memory, registers } = boot([0xb201]);
      memory.write(0x3002, 0x4100);
      registers.set(Register.R1, 0x00aa);
      cpu.step();
      expect(memory.peek(0x4100)).toBe(0x00aa);
    });

    it("STR writes base + offset", () => {
      // STR R1, R6, #3
      const { cpu, memory, registers } = boot([0x7383]);
      registers.set(Register.R6, 0x4000);
      registers.set(Register.R1, 0x0102);
      cpu.step();
      expect(memory.peek(0x4003)).toBe(0x0102);
    });
  });

  it("wraps the program counter past the top of memory", () => {
    const { cpu, memory, registers } = boot([]);
    memory.write(0xffff, 0x1065);
    registers.pc = 0xffff;
    cpu.step();
    expect(registers.pc).toBe(0x0000);
  });

  describe("faults", () => {
    it("refuses the reserved op code", () => {
      const { cpu, registers } = boot([0xd000, 0x1065]);
      expect(() => cpu.step()).toThrow(ReservedOpcodeError);
      expect(registers.get(Register.R0)).toBe(0);
    });

    it("reports where the fault happened", () => {
      const { cpu } = boot([0xd000]);
      expect(() => cpu.run()).toThrow(
        "Unused op code RES at 0x3000 [1101 0000 0000 0000]"
      );
    });

    it("refuses RTI", () => {
      const { cpu } = boot([0x8000]);
      expect(() => cpu.step()).toThrow("Unused op code RTI at 0x3000");
    });

    it("refuses undefined trap vectors", () => {
      const { cpu } = boot([0xf026]);
      expect(() => cpu.step()).toThrow(UnknownTrapError);
    });
  });

  describe("interrupts", () => {
    it("stops a loop that never polls the keyboard", () => {
      // BRnzp #-1
      const { cpu, io, registers } = boot([0x0fff]);
      io.interruptRequested = true;
      expect(cpu.run()).toBe(CPUState.INTERRUPTED);
      expect(io.interruptChecks).toBe(1);
      expect(registers.pc).toBe(0x3000);
      expect(cpu.step()).toBe(CPUState.INTERRUPTED);
    });

    it("checks between cycles at a fixed interval", () => {
      const { cpu, io } = boot([0x0fff]);
      let checks = 0;
      io.interrupted = () => ++checks === 3;
      expect(cpu.run()).toBe(CPUState.INTERRUPTED);
      expect(checks).toBe(3);
    });

    it("does not consult the host for a short program", () => {
      const { cpu, io } = boot([0xf025]);
      io.interruptRequested = true;
      expect(cpu.run()).toBe(CPUState.HALTED);
      expect(io.interruptChecks).toBe(0);
    });
  });

  describe("run", () => {
    it("loads an image and halts on the first cycle", () => {
      const io = new FakeIO();
      const cpu = new CPU(io);
      expect(cpu.loadImage(Buffer.from([0x30, 0x00, 0xf0, 0x25]))).toEqual({
        ok: true,
        origin: 0x3000,
        size: 1,
      });
      expect(cpu.step()).toBe(CPUState.HALTED);
      expect(io.flushed).toBe("HALT\n");
    });

    it("executes a loop until HALT", () => {
      const { cpu, registers } = boot([
        0x5020, // AND R0, R0, #0
        0x1023, // ADD R0, R0, #3
        0x1221, // ADD R1, R0, #1
        0x103f, // ADD R0, R0, #-1
        0x03fd, // BRp #-3
        0xf025, // HALT
      ]);
      expect(cpu.run()).toBe(CPUState.HALTED);
      expect(registers.get(Register.R0)).toBe(0);
      expect(registers.get(Register.R1)).toBe(2);
      expect(registers.get(Register.R7)).toBe(0x3006);
      expect(cpu.status).toBe(CPUState.HALTED);
    });

    it("does nothing once halted", () => {
      const { cpu, registers } = boot([0xf025, 0x1065]);
      cpu.run();
      expect(cpu.step()).toBe(CPUState.HALTED);
      expect(registers.pc).toBe(0x3001);
    });

    it("polls the keyboard through its status register", () => {
      const { cpu, registers } = boot(
        [
          0xa002, // LDI R0, KBSR
          0xa202, // LDI R1, KBDR
          0xf025, // HALT
          0xfe00,
          0xfe02,
        ],
        [0x61]
      );
      cpu.run();
      expect(registers.get(Register.R0)).toBe(0x8000);
      expect(registers.get(Register.R1)).toBe(0x61);
    });

    it("sees an idle keyboard as a clear status register", () => {
      const { cpu, registers } = boot([0xa002, 0xa202, 0xf025, 0xfe00, 0xfe02]);
      cpu.run();
      expect(registers.get(Register.R0)).toBe(0);
      expect(registers.get(Register.R1)).toBe(0);
    });
  });
});
