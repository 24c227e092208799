const OUTPUT_FLAGS = ["--json", "--human", "--markdown"];
const GENERATE_FLAGS = [
  "--ucsc-version",
  "--work-dir",
  "--recipes-dir",
  "--templates-dir",
  "--exceptions",
  "--offline"
];

function normalizedCommandList(commands: string[]) {
  return [...new Set(commands.map((command) => command.trim()).filter(Boolean))]
    .sort((a, b) => a.localeCompare(b));
}

function bashCompletion(commands: string[]) {
  const commandList = normalizedCommandList(commands);
  return `# ucsc-recipes bash completion
_ucsc_recipes_complete() {
  local cur prev words cword
  _init_completion || return
  local commands="${commandList.join(" ")}"

  if [[ $cword -eq 1 ]]; then
    COMPREPLY=( $(compgen -W "$commands" -- "$cur") )
    return
  fi

  case "$prev" in
    --work-dir|--recipes-dir|--templates-dir)
      _filedir -d
      return
      ;;
    --exceptions)
      _filedir json
      return
      ;;
  esac

  if [[ "\${words[1]}" == "generate" ]]; then
    COMPREPLY=( $(compgen -W "${[...GENERATE_FLAGS, ...OUTPUT_FLAGS].join(" ")}" -- "$cur") )
    return
  fi
  _filedir
}
complete -F _ucsc_recipes_complete ucsc-recipes
`;
}

function zshCompletion(commands: string[]) {
  const commandList = normalizedCommandList(commands);
  return `#compdef ucsc-recipes
_ucsc_recipes() {
  _arguments "1:command:(${commandList.join(" ")})" "*::arg:->args"

  case $state in
    args)
      case $words[1] in
        generate)
          _arguments \\
            "--ucsc-version[userApps release]:version:" \\
            "--work-dir[download directory]:dir:_files -/" \\
            "--recipes-dir[output directory]:dir:_files -/" \\
            "--templates-dir[template directory]:dir:_files -/" \\
            "--exceptions[exception tables file]:file:_files -g '*.json'" \\
            "--offline[reuse the local FOOTER]"
          ;;
        *)
          _files
          ;;
      esac
      ;;
  esac
}
_ucsc_recipes "$@"
`;
}

function fishCompletion(commands: string[]) {
  const commandList = normalizedCommandList(commands);
  return commandList
    .map((command) => `complete -c ucsc-recipes -f -n "__fish_use_subcommand" -a "${command}"`)
    .concat(
      GENERATE_FLAGS.map(
        (flag) => `complete -c ucsc-recipes -n '__fish_seen_subcommand_from generate' -l ${flag.slice(2)}`
      )
    )
    .join("\n");
}

export function completionScript(shell: "bash" | "zsh" | "fish", commands: string[]) {
  if (shell === "bash") {
    return bashCompletion(commands);
  }
  if (shell === "zsh") {
    return zshCompletion(commands);
  }
  return fishCompletion(commands);
}
