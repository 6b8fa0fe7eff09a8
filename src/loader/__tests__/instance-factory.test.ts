import { describe, it, expect, beforeEach } from 'vitest';
import { createContractInstance, resetInstanceCounter } from '../instance-factory.js';
import type { ContractHostConfig } from '../../types.js';
import { DEFAULT_HOST_CALL_WEIGHT, DEFAULT_MAX_GAS, DEFAULT_MAX_MEMORY_BYTES } from '../../types.js';
import { noChainExtension } from '../../chain-extension/chain-extension.js';
import { createFakeExt } from '../../chain-extension/__tests__/fake-ext.js';
import type { FakeExt } from '../../chain-extension/__tests__/fake-ext.js';

function makeConfig(overrides?: Partial<ContractHostConfig<FakeExt>>): ContractHostConfig<FakeExt> {
  return {
    maxMemoryBytes: DEFAULT_MAX_MEMORY_BYTES,
    maxGas: DEFAULT_MAX_GAS,
    hostCallWeight: DEFAULT_HOST_CALL_WEIGHT,
    chainExtension: noChainExtension,
    ext: createFakeExt(),
    ...overrides,
  };
}

describe('createContractInstance', () => {
  beforeEach(() => {
    resetInstanceCounter();
  });

  it('issues sequential ids', () => {
    expect(createContractInstance(makeConfig()).instance.id).toBe('contract-0');
    expect(createContractInstance(makeConfig()).instance.id).toBe('contract-1');
  });

  it('starts in the created state without a module', () => {
    const { instance, state } = createContractInstance(makeConfig());
    expect(instance.status).toBe('created');
    expect(state.status).toBe('created');
    expect(state.wasmModule).toBeNull();
    expect(state.wasmInstance).toBeNull();
  });

  it('freezes the public config', () => {
    const { instance } = createContractInstance(makeConfig());
    expect(Object.isFrozen(instance.config)).toBe(true);
  });

  it('allocates one page of memory that may grow to the configured limit', () => {
    const { state } = createContractInstance(makeConfig({ maxMemoryBytes: 3 * 65_536 }));
    expect(state.memory.buffer.byteLength).toBe(65_536);
    expect(state.memory.grow(2)).toBe(1);
    expect(() => state.memory.grow(1)).toThrow(RangeError);
  });

  it('rounds a limit below one page up to one page', () => {
    const { state } = createContractInstance(makeConfig({ maxMemoryBytes: 100 }));
    expect(state.memory.buffer.byteLength).toBe(65_536);
    expect(() => state.memory.grow(1)).toThrow(RangeError);
  });

  it('creates a gas meter with the configured budget', () => {
    const { state } = createContractInstance(makeConfig({ maxGas: 250 }));
    expect(state.gasMeter.gasLimit).toBe(250);
    expect(state.gasMeter.gasUsed).toBe(0);
  });

  it('initialises metrics from the config', () => {
    const { state } = createContractInstance(makeConfig({ maxMemoryBytes: 131_072, maxGas: 7 }));
    expect(state.metrics).toEqual({
      memoryUsedBytes: 65_536,
      memoryLimitBytes: 131_072,
      gasUsed: 0,
      gasLimit: 7,
    });
  });
});
