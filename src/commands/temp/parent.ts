/**
 * Motivación: agrupar los subcomandos de canales temporales bajo `/temp`.
 *
 * Alcance: solo declara el comando padre; cada acción vive en su `*.command.ts`.
 */
import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "temp",
  description: "Create and manage temporary channels",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class TempParent extends Command {}
