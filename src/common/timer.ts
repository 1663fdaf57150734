export class CliTimer {
  private startTime: number;

  constructor() {
    this.startTime = Date.now();
  }

  start() {
    this.startTime = Date.now();
  }

  stop() {
    const elapsedSeconds = (Date.now() - this.startTime)/1000;
    console.log(`\nProgram completed in ${elapsedSeconds.toFixed(1)} seconds`);
    return elapsedSeconds;
  }
}
