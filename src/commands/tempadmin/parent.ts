/**
 * Motivación: agrupar la administración de canales temporales bajo `/tempadmin`.
 *
 * Alcance: declara el comando padre; Discord solo lo muestra a quien tiene Manage Channels.
 */
import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "tempadmin",
  description: "Administer temporary channels on this server",
  defaultMemberPermissions: ["ManageChannels"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class TempAdminParent extends Command {}
