declare module 'turndown-plugin-gfm' {
  import TurndownService from 'turndown';

  function gfm(service: TurndownService): void;

  export { gfm };
}
