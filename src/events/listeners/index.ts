/**
 * Registra los listeners de eventos.
 *
 * Cada módulo se suscribe a sus hooks como efecto de importación; importar este
 * archivo una vez en el bootstrap basta para activarlos.
 */
import "./tempChannels";
