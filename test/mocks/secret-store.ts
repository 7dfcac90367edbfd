import type { SecretStore } from '@services/credential.service.js'

/**
 * SecretStore held in memory
 */
export class MemorySecretStore implements SecretStore {
  constructor(public value: string | null = null) {}

  async read(): Promise<string | null> {
    return this.value
  }

  async write(value: string): Promise<void> {
    this.value = value
  }

  async remove(): Promise<boolean> {
    const existed = this.value !== null
    this.value = null
    return existed
  }
}
