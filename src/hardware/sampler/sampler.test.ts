import { createCommandSampler } from './sampler';
import { SamplerUnavailableError } from '$types/errors';

describe('createCommandSampler', () => {
  const config = { command: 'sample-screen', args: ['--center'], timeoutMs: 500 };

  it('should run the command and parse its output', async () => {
    const exec = vi.fn(() => Promise.resolve({ stdout: '#336699\n' }));
    const sampler = createCommandSampler(config, exec);
    const signal = new AbortController().signal;

    await expect(sampler.sample(signal)).resolves.toEqual({ r: 51, g: 102, b: 153 });
    expect(exec).toHaveBeenCalledWith('sample-screen', ['--center'], { timeout: 500, signal, windowsHide: true });
  });

  it('should fail without a configured command', async () => {
    const exec = vi.fn(() => Promise.resolve({ stdout: '#336699' }));
    const sampler = createCommandSampler({ ...config, command: null }, exec);

    await expect(sampler.sample(new AbortController().signal)).rejects.toThrow(SamplerUnavailableError);
    expect(exec).not.toHaveBeenCalled();
  });

  it('should wrap command failures', async () => {
    const exec = vi.fn(() => Promise.reject(new Error('spawn sample-screen ENOENT')));
    const sampler = createCommandSampler(config, exec);

    await expect(sampler.sample(new AbortController().signal)).rejects.toThrow(
      'sample-screen failed: spawn sample-screen ENOENT'
    );
  });

  it('should fail when the output has no color', async () => {
    const exec = vi.fn(() => Promise.resolve({ stdout: 'nothing here' }));
    const sampler = createCommandSampler(config, exec);

    await expect(sampler.sample(new AbortController().signal)).rejects.toThrow('sample-screen printed no color');
  });
});
