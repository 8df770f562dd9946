import type { IntrusionPreventionPolicy, MonitoringLevel } from "../types.js"

type IniValue = string | number | boolean

interface IniSection {
  name: string
  comment?: string
  entries: ReadonlyArray<readonly [string, IniValue | undefined]>
}

function renderSection(section: IniSection): string[] {
  return [
    ...(section.comment ? [`# ${section.comment}`] : []),
    `[${section.name}]`,
    ...section.entries.flatMap(([key, value]) => (value === undefined ? [] : [`${key} = ${String(value)}`])),
  ]
}

/**
 * fail2ban `jail.d` drop-in. Bans go through the ufw action so they stack
 * on top of the synthesized rules rather than replacing them.
 */
export function renderJailConfig(policy: IntrusionPreventionPolicy, level: MonitoringLevel): string {
  const sections: IniSection[] = [
    {
      name: "DEFAULT",
      entries: [
        ["bantime", policy.bantime],
        ["findtime", policy.findtime],
        ["maxretry", policy.maxretry],
        ["ignoreip", policy.ignoreCidrs.join(" ")],
        ["banaction", "ufw"],
      ],
    },
    ...policy.jails.map(
      (jail): IniSection => ({
        name: jail.name,
        comment: jail.description,
        entries: [
          ["enabled", true],
          ["port", jail.port],
          ["filter", jail.filter],
          ["logpath", jail.logpath],
          ["maxretry", jail.maxretry],
          ["bantime", jail.bantime],
        ],
      }),
    ),
  ]

  const header = [`# hostkit intrusion prevention (${level})`, "# managed file, local edits are overwritten"]
  return `${[header, ...sections.map(renderSection)].map(lines => lines.join("\n")).join("\n\n")}\n`
}
