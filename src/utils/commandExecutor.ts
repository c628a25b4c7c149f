import { spawn } from 'child_process'
import { Debugger } from './debug'

/**
 * Anything that can run a command and resolve with its stdout.
 * Implemented by CommandExecutor; tests substitute their own.
 */
export interface CommandRunner {
  execute (command: string, args: string[]): Promise<string>
}

/**
 * Raised when a spawned command exits non-zero or cannot be started.
 * Keeps the raw streams so callers can surface the tool's own message.
 */
export class CommandError extends Error {
  /** Exit code, or null when the process never ran or was killed by a signal */
  readonly exitCode: number | null
  readonly stdout: string
  readonly stderr: string
  readonly command: string

  constructor (message: string, command: string, exitCode: number | null, stdout: string, stderr: string) {
    super(message)
    this.name = 'CommandError'
    this.command = command
    this.exitCode = exitCode
    this.stdout = stdout
    this.stderr = stderr
  }
}

/**
 * CommandExecutor provides safe command execution using spawn.
 * It never uses shell concatenation and properly handles stdout/stderr.
 */
export class CommandExecutor implements CommandRunner {
  private debug: Debugger

  constructor () {
    this.debug = new Debugger('command-executor')
  }

  /**
   * Executes a command using spawn.
   * @param command - The command to execute
   * @param args - The arguments to pass to the command
   * @returns A Promise that resolves with stdout on success or rejects with a CommandError
   */
  execute (command: string, args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
      const fullCommand = `${command} ${args.join(' ')}`
      this.debug.log(`Executing: ${fullCommand}`)

      const childProcess = spawn(command, args)
      let stdout = ''
      let stderr = ''

      childProcess.stdout.on('data', (data) => {
        stdout += data
      })

      childProcess.stderr.on('data', (data) => {
        stderr += data
      })

      childProcess.on('close', (code) => {
        if (code === 0) {
          this.debug.log(`Command completed successfully: ${fullCommand}`)
          resolve(stdout)
        } else {
          const errorMsg = `Command failed with exit code ${code}: ${fullCommand}\nstdout: ${stdout}\nstderr: ${stderr}`
          this.debug.log('error', errorMsg)
          reject(new CommandError(errorMsg, fullCommand, code, stdout, stderr))
        }
      })

      childProcess.on('error', (error) => {
        const errorMsg = `Error occurred while executing command: ${fullCommand}: ${error.message}`
        this.debug.log('error', errorMsg)
        reject(new CommandError(errorMsg, fullCommand, null, stdout, stderr))
      })
    })
  }
}
