// javascript-state-machine 3.x ships without typings; @types covers only 2.x.
declare module 'javascript-state-machine' {
  interface Transition {
    name: string;
    from: string | string[];
    to: string;
  }

  interface Config {
    init: string;
    transitions: Transition[];
  }

  class StateMachine {
    constructor(config: Config);
    can(transition: string): boolean;
    transitions(): string[];
  }

  export = StateMachine;
}
